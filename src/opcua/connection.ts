/**
 * OPC UA connection handle
 *
 * Wraps an OPCUAClient and the single ClientSession opened on it. The
 * accessor only ever talks to the OpcUaConnection interface, which lets a
 * pre-built connection (or an in-process fake) stand in for the real client.
 *
 * No reconnection: the client is created without connection retries and
 * without session keep-alive, and a lost connection stays lost until the
 * caller opens a new one.
 */

import {
  AttributeIds,
  OPCUAClient,
  type DataValue,
  type OPCUAClientOptions,
  type ReadValueIdOptions,
  type StatusCode,
  type Variant,
  type WriteValueOptions,
} from 'node-opcua-client';
import { ConnectionError, NotConnectedError } from '../errors';
import { createLogger } from '../logging/logger';
import { LogComponents, type Logger } from '../logging/types';

export const DEFAULT_APPLICATION_NAME = 'opcua-variable-accessor';
export const DEFAULT_SESSION_TIMEOUT = 60000;

/**
 * Client handle as seen by the accessor
 */
export interface OpcUaConnection {
  readonly endpointUrl: string;
  isConnected(): boolean;
  /** Reads the Value attribute with maxAge 0 */
  read(nodeId: string): Promise<DataValue>;
  write(nodeId: string, value: Variant): Promise<StatusCode>;
  disconnect(): Promise<void>;
}

/**
 * The parts of ClientSession this module uses
 */
export interface SessionHandle {
  read(nodeToRead: ReadValueIdOptions, maxAge?: number): Promise<DataValue>;
  write(nodeToWrite: WriteValueOptions): Promise<StatusCode>;
  close(deleteSubscriptions?: boolean): Promise<void>;
}

/**
 * The parts of OPCUAClient this module uses
 */
export interface ClientHandle {
  connect(endpointUrl: string): Promise<void>;
  createSession(): Promise<SessionHandle>;
  disconnect(): Promise<void>;
}

export type ClientFactory = (options: OPCUAClientOptions) => ClientHandle;

export interface ConnectionOptions {
  applicationName?: string;
  requestedSessionTimeout?: number;
  logger?: Logger;
  clientFactory?: ClientFactory;
}

const createNodeOpcuaClient: ClientFactory = options => OPCUAClient.create(options);

export class NodeOpcuaConnection implements OpcUaConnection {
  private session: SessionHandle | null;

  private constructor(
    public readonly endpointUrl: string,
    private readonly client: ClientHandle,
    session: SessionHandle,
    private readonly logger: Logger
  ) {
    this.session = session;
  }

  /**
   * Connects to the endpoint and creates an anonymous session.
   *
   * @throws ConnectionError when either step fails
   */
  static async open(endpointUrl: string, options: ConnectionOptions = {}): Promise<NodeOpcuaConnection> {
    const logger = options.logger ?? createLogger(LogComponents.CONNECTION);
    const clientFactory = options.clientFactory ?? createNodeOpcuaClient;

    const client = clientFactory({
      applicationName: options.applicationName ?? DEFAULT_APPLICATION_NAME,
      connectionStrategy: {
        maxRetry: 0,
        initialDelay: 1000,
        maxDelay: 1000,
      },
      endpointMustExist: false,
      keepSessionAlive: false,
      requestedSessionTimeout: options.requestedSessionTimeout ?? DEFAULT_SESSION_TIMEOUT,
    });

    logger.info(`Connecting to OPC UA server`, { endpointUrl });

    try {
      await client.connect(endpointUrl);
    } catch (error) {
      logger.error(`Connection to OPC UA server failed`, {
        endpointUrl,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ConnectionError(endpointUrl, 'connect', error);
    }

    let session: SessionHandle;
    try {
      session = await client.createSession();
    } catch (error) {
      logger.error(`Session creation failed`, {
        endpointUrl,
        error: error instanceof Error ? error.message : String(error),
      });
      try {
        await client.disconnect();
      } catch (disconnectError) {
        logger.debug(`Error disconnecting client during cleanup: ${disconnectError}`);
      }
      throw new ConnectionError(endpointUrl, 'session', error);
    }

    logger.info(`Session established`, { endpointUrl });

    return new NodeOpcuaConnection(endpointUrl, client, session, logger);
  }

  isConnected(): boolean {
    return this.session !== null;
  }

  async read(nodeId: string): Promise<DataValue> {
    const session = this.requireSession();
    return session.read({ nodeId, attributeId: AttributeIds.Value }, 0);
  }

  async write(nodeId: string, value: Variant): Promise<StatusCode> {
    const session = this.requireSession();
    return session.write({
      nodeId,
      attributeId: AttributeIds.Value,
      value: { value },
    });
  }

  /**
   * Closes the session, then the client. A second call is a no-op.
   * The client is disconnected even when closing the session fails.
   */
  async disconnect(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = null;

    try {
      await session.close();
    } finally {
      await this.client.disconnect();
      this.logger.debug(`Client disconnected`, { endpointUrl: this.endpointUrl });
    }
  }

  private requireSession(): SessionHandle {
    if (!this.session) {
      throw new NotConnectedError(this.endpointUrl);
    }
    return this.session;
  }
}
