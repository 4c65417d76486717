import { buildEndpointUrl, toNodeId, DEFAULT_NAMESPACE_INDEX } from '../../../src/opcua/node-address';
import { ConfigurationError, InvalidVariableNameError } from '../../../src/errors';

describe('node addressing', () => {
  describe('buildEndpointUrl', () => {
    it('should build an opc.tcp URL from host and port', () => {
      expect(buildEndpointUrl('192.168.1.100', 4840)).toBe('opc.tcp://192.168.1.100:4840');
      expect(buildEndpointUrl('plc.local', 48010)).toBe('opc.tcp://plc.local:48010');
    });

    it('should reject an empty host', () => {
      expect(() => buildEndpointUrl('', 4840)).toThrow(ConfigurationError);
      expect(() => buildEndpointUrl('   ', 4840)).toThrow(ConfigurationError);
    });

    it('should reject ports outside 1..65535', () => {
      expect(() => buildEndpointUrl('localhost', 0)).toThrow(ConfigurationError);
      expect(() => buildEndpointUrl('localhost', 65536)).toThrow(ConfigurationError);
      expect(() => buildEndpointUrl('localhost', 48.5)).toThrow('port must be an integer between 1 and 65535, got 48.5');
    });
  });

  describe('toNodeId', () => {
    it('should default to namespace 2', () => {
      expect(DEFAULT_NAMESPACE_INDEX).toBe(2);
      expect(toNodeId('Temperature')).toBe('ns=2;s=Temperature');
    });

    it('should use the given namespace index', () => {
      expect(toNodeId('Temperature', 5)).toBe('ns=5;s=Temperature');
    });

    it('should take the name verbatim', () => {
      expect(toNodeId('Line1.Motor;Speed')).toBe('ns=2;s=Line1.Motor;Speed');
      expect(toNodeId(' padded ')).toBe('ns=2;s= padded ');
    });

    it('should reject an empty name', () => {
      expect(() => toNodeId('')).toThrow(InvalidVariableNameError);
    });
  });
});
