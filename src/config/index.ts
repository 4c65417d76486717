/**
 * Accessor configuration
 *
 * Validated with zod. Values can be given directly or read from the
 * environment through loadConfigFromEnv().
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { DEFAULT_NAMESPACE_INDEX, DEFAULT_PORT } from '../opcua/node-address';
import { DEFAULT_APPLICATION_NAME, DEFAULT_SESSION_TIMEOUT } from '../opcua/connection';

/**
 * What readAs() does with a value it cannot parse:
 * - throw: raise ConversionError
 * - default: log a warning and return the type's zero value
 */
export const ConversionFailurePolicySchema = z.enum(['throw', 'default']);
export type ConversionFailurePolicy = z.infer<typeof ConversionFailurePolicySchema>;

export const AccessorConfigSchema = z.object({
  /** Server host name or IP address */
  host: z.string().trim().min(1, 'host is required'),

  /** Server port */
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),

  /** Namespace every variable name is resolved in */
  namespaceIndex: z.number().int().min(0).default(DEFAULT_NAMESPACE_INDEX),

  conversionFailure: ConversionFailurePolicySchema.default('throw'),

  applicationName: z.string().min(1).default(DEFAULT_APPLICATION_NAME),

  /** Session timeout requested from the server, in milliseconds */
  requestedSessionTimeout: z.number().int().positive().default(DEFAULT_SESSION_TIMEOUT),
});

export type AccessorConfig = z.infer<typeof AccessorConfigSchema>;
export type AccessorConfigInput = z.input<typeof AccessorConfigSchema>;

export function parseAccessorConfig(input: AccessorConfigInput): AccessorConfig {
  const result = AccessorConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigurationError(issues);
  }
  return result.data;
}

function optionalInt(raw: string | undefined): number | undefined {
  return raw ? Number(raw) : undefined;
}

/**
 * Reads OPCUA_HOST, OPCUA_PORT, OPCUA_NAMESPACE_INDEX, OPCUA_CONVERSION_FAILURE,
 * OPCUA_APPLICATION_NAME and OPCUA_SESSION_TIMEOUT_MS.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AccessorConfig {
  const conversionFailure = env.OPCUA_CONVERSION_FAILURE
    ? ConversionFailurePolicySchema.safeParse(env.OPCUA_CONVERSION_FAILURE)
    : undefined;

  if (conversionFailure && !conversionFailure.success) {
    throw new ConfigurationError(
      `OPCUA_CONVERSION_FAILURE must be 'throw' or 'default', got '${env.OPCUA_CONVERSION_FAILURE}'`
    );
  }

  return parseAccessorConfig({
    host: env.OPCUA_HOST ?? '',
    port: optionalInt(env.OPCUA_PORT),
    namespaceIndex: optionalInt(env.OPCUA_NAMESPACE_INDEX),
    conversionFailure: conversionFailure?.data,
    applicationName: env.OPCUA_APPLICATION_NAME || undefined,
    requestedSessionTimeout: optionalInt(env.OPCUA_SESSION_TIMEOUT_MS),
  });
}
