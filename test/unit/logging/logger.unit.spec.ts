import { Writable } from 'stream';
import winston from 'winston';
import rootLogger, { createLogger } from '../../../src/logging/logger';
import { LogComponents } from '../../../src/logging/types';

describe('logger', () => {
  let lines: string[];
  let transport: InstanceType<typeof winston.transports.Stream>;

  beforeEach(() => {
    lines = [];
    transport = new winston.transports.Stream({
      stream: new Writable({
        write(chunk, _encoding, callback) {
          lines.push(chunk.toString());
          callback();
        },
      }),
    });
    rootLogger.add(transport);
  });

  afterEach(() => {
    rootLogger.remove(transport);
  });

  it('should tag entries with the component and service', async () => {
    createLogger(LogComponents.ACCESSOR).warn('Conversion to int32 failed, returning default', {
      variableName: 'x',
    });
    await new Promise(resolve => setImmediate(resolve));

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 'warn',
      message: 'Conversion to int32 failed, returning default',
      component: 'VariableAccessor',
      service: 'opcua-variable-accessor',
      variableName: 'x',
    });
  });
});
