/**
 * OPC UA Variable Accessor
 *
 * Read/write access to server variables by name on top of a single
 * OPC UA connection. Names resolve to string node identifiers in one
 * namespace (2 by default), read values can be coerced to primitives and
 * written values are wrapped in a type-tagged Variant.
 *
 * Calls are sequential per accessor: each public method awaits exactly one
 * request on the underlying session, and calls made while another is in
 * flight are queued in call order. There is no retry, no reconnection and
 * no timeout other than the client library's own.
 *
 * Example:
 *   const accessor = await VariableAccessor.connect({ host: '192.168.1.100', port: 4840 });
 *   await accessor.write('Setpoint', 21.5);
 *   const temperature = await accessor.readDouble('Temperature');
 *   await accessor.shutdown();
 *
 * @module variable-accessor
 */

import { DataType, type DataValue, type StatusCode, type Variant } from 'node-opcua-client';
import { parseAccessorConfig, type AccessorConfigInput, type ConversionFailurePolicy } from '../config';
import { ConversionError, NotConnectedError, OpcUaAccessError, ReadError, WriteError } from '../errors';
import { createLogger } from '../logging/logger';
import { LogComponents, type Logger } from '../logging/types';
import { parseAs, stringifyValue, zeroValue, type PrimitiveType, type PrimitiveTypeMap } from './coercion';
import { NodeOpcuaConnection, type ClientFactory, type OpcUaConnection } from './connection';
import { DEFAULT_NAMESPACE_INDEX, buildEndpointUrl, toNodeId } from './node-address';
import { determineQuality, type Quality } from './status';
import { fromVariant, toVariant, type WritableValue } from './variant';

export interface VariableAccessorOptions {
  logger?: Logger;
  namespaceIndex?: number;
  conversionFailure?: ConversionFailurePolicy;
}

export interface ConnectDependencies {
  logger?: Logger;
  clientFactory?: ClientFactory;
}

/**
 * A single read, with the metadata the server returned alongside the value
 */
export interface VariableReading {
  variableName: string;
  nodeId: string;
  value: unknown;
  dataType: string;
  quality: Quality;
  statusCode: string;
  sourceTimestamp: Date | null;
  serverTimestamp: Date | null;
}

export class VariableAccessor {
  private readonly logger: Logger;
  private readonly namespaceIndex: number;
  private readonly conversionFailure: ConversionFailurePolicy;

  // Tail of the call queue; never rejects
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(
    private readonly connection: OpcUaConnection,
    options: VariableAccessorOptions = {}
  ) {
    this.logger = options.logger ?? createLogger(LogComponents.ACCESSOR);
    this.namespaceIndex = options.namespaceIndex ?? DEFAULT_NAMESPACE_INDEX;
    this.conversionFailure = options.conversionFailure ?? 'throw';
  }

  /**
   * Opens a connection to opc.tcp://<host>:<port> and resolves once the
   * session is established.
   *
   * @throws ConfigurationError on invalid configuration
   * @throws ConnectionError when the server cannot be reached
   */
  static async connect(config: AccessorConfigInput, dependencies: ConnectDependencies = {}): Promise<VariableAccessor> {
    const { host, port, namespaceIndex, conversionFailure, applicationName, requestedSessionTimeout } =
      parseAccessorConfig(config);

    const connection = await NodeOpcuaConnection.open(buildEndpointUrl(host, port), {
      applicationName,
      requestedSessionTimeout,
      logger: dependencies.logger,
      clientFactory: dependencies.clientFactory,
    });

    return new VariableAccessor(connection, {
      logger: dependencies.logger,
      namespaceIndex,
      conversionFailure,
    });
  }

  /**
   * Wraps an already-connected handle
   */
  static fromConnection(connection: OpcUaConnection, options?: VariableAccessorOptions): VariableAccessor {
    return new VariableAccessor(connection, options);
  }

  get endpointUrl(): string {
    return this.connection.endpointUrl;
  }

  isConnected(): boolean {
    return !this.closed && this.connection.isConnected();
  }

  /**
   * Reads a variable and returns its raw value
   */
  async read(variableName: string): Promise<unknown> {
    const reading = await this.readDataValue(variableName);
    return reading.value;
  }

  /**
   * Reads a variable along with its data type, status and timestamps.
   * Uncertain values are returned; bad ones are raised as ReadError.
   */
  async readDataValue(variableName: string): Promise<VariableReading> {
    const { reading } = await this.readVariable(variableName);
    return reading;
  }

  private async readVariable(variableName: string): Promise<{ reading: VariableReading; dataType: DataType }> {
    const nodeId = toNodeId(variableName, this.namespaceIndex);

    return this.serialize(async () => {
      this.ensureConnected();

      let dataValue: DataValue;
      try {
        dataValue = await this.connection.read(nodeId);
      } catch (error) {
        if (error instanceof NotConnectedError) {
          throw error;
        }
        throw new ReadError(variableName, nodeId, { cause: error });
      }

      const quality = determineQuality(dataValue.statusCode);
      if (quality === 'BAD') {
        this.logger.debug(`Read rejected by server`, {
          variableName,
          nodeId,
          statusCode: dataValue.statusCode.name,
        });
        throw new ReadError(variableName, nodeId, { statusCode: dataValue.statusCode });
      }

      const value = fromVariant(dataValue.value);
      this.logger.debug(`Read ${variableName}`, { nodeId, quality });

      const reading: VariableReading = {
        variableName,
        nodeId,
        value,
        dataType: DataType[dataValue.value.dataType],
        quality,
        statusCode: dataValue.statusCode.name,
        sourceTimestamp: dataValue.sourceTimestamp,
        serverTimestamp: dataValue.serverTimestamp,
      };
      return { reading, dataType: dataValue.value.dataType };
    });
  }

  /**
   * Reads a variable, renders it as text and parses the text into `type`.
   * Unparsable text raises ConversionError, or yields the type's zero value
   * under the 'default' conversion policy.
   */
  async readAs<T extends PrimitiveType>(variableName: string, type: T): Promise<PrimitiveTypeMap[T]> {
    const { reading, dataType } = await this.readVariable(variableName);
    const text = stringifyValue(reading.value, dataType);

    try {
      return parseAs(text, type);
    } catch (error) {
      if (!(error instanceof ConversionError)) {
        throw error;
      }
      if (this.conversionFailure === 'default') {
        this.logger.warn(`Conversion to ${type} failed, returning default`, {
          variableName,
          value: text,
        });
        return zeroValue(type);
      }
      throw new ConversionError(text, type, variableName);
    }
  }

  async readString(variableName: string): Promise<string> {
    return this.readAs(variableName, 'string');
  }

  async readInt16(variableName: string): Promise<number> {
    return this.readAs(variableName, 'int16');
  }

  async readInt32(variableName: string): Promise<number> {
    return this.readAs(variableName, 'int32');
  }

  async readFloat(variableName: string): Promise<number> {
    return this.readAs(variableName, 'float');
  }

  async readDouble(variableName: string): Promise<number> {
    return this.readAs(variableName, 'double');
  }

  /**
   * "true" (any case) and "1" are true; everything else is false
   */
  async readBoolean(variableName: string): Promise<boolean> {
    return this.readAs(variableName, 'boolean');
  }

  /**
   * Writes a value, inferring its OPC UA data type unless `dataType` is given
   *
   * @throws WriteError when the request fails or the server rejects the write
   */
  async write(variableName: string, value: WritableValue, dataType?: DataType): Promise<void> {
    const nodeId = toNodeId(variableName, this.namespaceIndex);

    let variant: Variant;
    try {
      variant = toVariant(value, dataType);
    } catch (error) {
      if (error instanceof OpcUaAccessError) {
        throw error;
      }
      // node-opcua rejects values that do not fit an explicit data type
      throw new WriteError(variableName, nodeId, { cause: error });
    }

    return this.serialize(async () => {
      this.ensureConnected();

      let statusCode: StatusCode;
      try {
        statusCode = await this.connection.write(nodeId, variant);
      } catch (error) {
        if (error instanceof NotConnectedError) {
          throw error;
        }
        throw new WriteError(variableName, nodeId, { cause: error });
      }

      if (determineQuality(statusCode) !== 'GOOD') {
        throw new WriteError(variableName, nodeId, { statusCode });
      }

      this.logger.debug(`Wrote ${variableName}`, { nodeId, dataType: DataType[variant.dataType] });
    });
  }

  /**
   * Disconnects from the server. Never rejects: disconnect failures are
   * logged and swallowed. Later calls on this accessor fail with
   * NotConnectedError.
   */
  async shutdown(): Promise<void> {
    return this.serialize(async () => {
      if (this.closed) {
        return;
      }
      this.closed = true;

      try {
        await this.connection.disconnect();
      } catch (error) {
        this.logger.warn(`Error while disconnecting from OPC UA server`, {
          endpointUrl: this.endpointUrl,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      this.logger.info(`OPC UA connection closed`, { endpointUrl: this.endpointUrl });
    });
  }

  private ensureConnected(): void {
    if (!this.isConnected()) {
      throw new NotConnectedError(this.endpointUrl);
    }
  }

  /**
   * Runs `fn` after every previously queued call has settled
   */
  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.queue.then(fn);
    this.queue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }
}
