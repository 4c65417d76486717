/**
 * Mock OPC UA Connection for Testing
 * ==================================
 *
 * Controllable OpcUaConnection backed by sinon stubs, for exercising the
 * accessor without a server.
 */

import { stub, SinonStub } from 'sinon';
import { DataType, DataValue, StatusCode, StatusCodes, Variant } from 'node-opcua-client';
import type { OpcUaConnection } from '../../src/opcua/connection';

export class MockOpcUaConnection implements OpcUaConnection {
  public readStub: SinonStub<[string], Promise<DataValue>>;
  public writeStub: SinonStub<[string, Variant], Promise<StatusCode>>;
  public disconnectStub: SinonStub<[], Promise<void>>;
  public connected = true;

  constructor(public readonly endpointUrl: string = 'opc.tcp://localhost:4840') {
    this.readStub = stub<[string], Promise<DataValue>>();
    this.writeStub = stub<[string, Variant], Promise<StatusCode>>().resolves(StatusCodes.Good);
    this.disconnectStub = stub<[], Promise<void>>().resolves();
  }

  isConnected(): boolean {
    return this.connected;
  }

  async read(nodeId: string): Promise<DataValue> {
    return this.readStub(nodeId);
  }

  async write(nodeId: string, value: Variant): Promise<StatusCode> {
    return this.writeStub(nodeId, value);
  }

  async disconnect(): Promise<void> {
    return this.disconnectStub();
  }

  /**
   * Helper: every read resolves to a good value of the given type
   */
  mockReadValue(value: unknown, dataType: DataType = DataType.String): void {
    this.readStub.resolves(
      new DataValue({
        value: new Variant({ dataType, value }),
        statusCode: StatusCodes.Good,
        sourceTimestamp: new Date('2024-01-01T00:00:00.000Z'),
        serverTimestamp: new Date('2024-01-01T00:00:01.000Z'),
      })
    );
  }

  /**
   * Helper: every read resolves to a value-less DataValue with the given status
   */
  mockReadStatus(statusCode: StatusCode): void {
    this.readStub.resolves(new DataValue({ statusCode }));
  }
}
