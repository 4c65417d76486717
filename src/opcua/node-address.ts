/**
 * Node addressing
 *
 * Variables are addressed by name only: every name maps to a string node
 * identifier in a single namespace (2 unless configured otherwise).
 */

import { ConfigurationError, InvalidVariableNameError } from '../errors';

export const DEFAULT_NAMESPACE_INDEX = 2;
export const DEFAULT_PORT = 4840;

export function buildEndpointUrl(host: string, port: number): string {
  if (!host || host.trim() === '') {
    throw new ConfigurationError('host is required');
  }
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`port must be an integer between 1 and 65535, got ${port}`);
  }
  return `opc.tcp://${host}:${port}`;
}

/**
 * "Temperature" -> "ns=2;s=Temperature". The name is taken verbatim.
 */
export function toNodeId(variableName: string, namespaceIndex: number = DEFAULT_NAMESPACE_INDEX): string {
  if (variableName === '') {
    throw new InvalidVariableNameError(variableName);
  }
  return `ns=${namespaceIndex};s=${variableName}`;
}
