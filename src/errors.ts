/**
 * Accessor errors
 *
 * Every failure raised by this package is an OpcUaAccessError. Failures coming
 * from the underlying client are attached as `cause`.
 */

import type { StatusCode } from 'node-opcua-client';
import { describeStatus, type StatusCategory } from './opcua/status';

export interface AccessErrorOptions {
  cause?: unknown;
}

export class OpcUaAccessError extends Error {
  constructor(message: string, options?: AccessErrorOptions) {
    super(message, options);
    this.name = 'OpcUaAccessError';
  }
}

export class ConfigurationError extends OpcUaAccessError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'ConfigurationError';
  }
}

export class ConnectionError extends OpcUaAccessError {
  constructor(
    public readonly endpointUrl: string,
    stage: 'connect' | 'session',
    cause: unknown
  ) {
    super(
      stage === 'connect'
        ? `Failed to connect to OPC UA server at ${endpointUrl}`
        : `Failed to create session on OPC UA server at ${endpointUrl}`,
      { cause }
    );
    this.name = 'ConnectionError';
  }
}

export class NotConnectedError extends OpcUaAccessError {
  constructor(public readonly endpointUrl: string) {
    super(`Not connected to OPC UA server at ${endpointUrl}`);
    this.name = 'NotConnectedError';
  }
}

export class InvalidVariableNameError extends OpcUaAccessError {
  constructor(variableName: string) {
    super(`Invalid variable name: "${variableName}"`);
    this.name = 'InvalidVariableNameError';
  }
}

export interface ServiceErrorOptions extends AccessErrorOptions {
  statusCode?: StatusCode;
}

/**
 * Read or write failure. Carries the server's status when the server answered,
 * or the transport failure as `cause` when it did not.
 */
export abstract class ServiceError extends OpcUaAccessError {
  public readonly statusCode?: string;
  public readonly category?: StatusCategory;

  constructor(
    operation: 'read' | 'write',
    public readonly variableName: string,
    public readonly nodeId: string,
    options: ServiceErrorOptions = {}
  ) {
    const status = options.statusCode ? ` (${options.statusCode.name})` : '';
    super(`Failed to ${operation} variable ${variableName} [${nodeId}]${status}`, { cause: options.cause });
    if (options.statusCode) {
      this.statusCode = options.statusCode.name;
      this.category = describeStatus(options.statusCode);
    }
  }
}

export class ReadError extends ServiceError {
  constructor(variableName: string, nodeId: string, options?: ServiceErrorOptions) {
    super('read', variableName, nodeId, options);
    this.name = 'ReadError';
  }
}

export class WriteError extends ServiceError {
  constructor(variableName: string, nodeId: string, options?: ServiceErrorOptions) {
    super('write', variableName, nodeId, options);
    this.name = 'WriteError';
  }
}

export class ConversionError extends OpcUaAccessError {
  constructor(
    public readonly value: string,
    public readonly targetType: string,
    public readonly variableName?: string
  ) {
    super(
      variableName
        ? `Cannot convert value "${value}" of variable ${variableName} to ${targetType}`
        : `Cannot convert value "${value}" to ${targetType}`
    );
    this.name = 'ConversionError';
  }
}

export class UnsupportedValueError extends OpcUaAccessError {
  constructor(value: unknown) {
    super(`Cannot infer an OPC UA data type for value of type ${typeof value}`);
    this.name = 'UnsupportedValueError';
  }
}
