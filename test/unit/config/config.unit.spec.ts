import { loadConfigFromEnv, parseAccessorConfig } from '../../../src/config';
import { ConfigurationError } from '../../../src/errors';

describe('accessor configuration', () => {
  describe('parseAccessorConfig', () => {
    it('should apply defaults', () => {
      expect(parseAccessorConfig({ host: 'localhost' })).toEqual({
        host: 'localhost',
        port: 4840,
        namespaceIndex: 2,
        conversionFailure: 'throw',
        applicationName: 'opcua-variable-accessor',
        requestedSessionTimeout: 60000,
      });
    });

    it('should keep explicit values', () => {
      const config = parseAccessorConfig({
        host: '10.0.0.5',
        port: 48010,
        namespaceIndex: 3,
        conversionFailure: 'default',
        applicationName: 'packaging-line',
        requestedSessionTimeout: 15000,
      });

      expect(config.port).toBe(48010);
      expect(config.namespaceIndex).toBe(3);
      expect(config.conversionFailure).toBe('default');
      expect(config.applicationName).toBe('packaging-line');
      expect(config.requestedSessionTimeout).toBe(15000);
    });

    it('should reject a blank host', () => {
      expect(() => parseAccessorConfig({ host: '  ' })).toThrow('Invalid configuration: host: host is required');
    });

    it('should reject an out-of-range port', () => {
      expect(() => parseAccessorConfig({ host: 'localhost', port: 70000 })).toThrow(ConfigurationError);
    });
  });

  describe('loadConfigFromEnv', () => {
    it('should read OPCUA_* variables', () => {
      const config = loadConfigFromEnv({
        OPCUA_HOST: 'plc.local',
        OPCUA_PORT: '4841',
        OPCUA_NAMESPACE_INDEX: '3',
        OPCUA_CONVERSION_FAILURE: 'default',
        OPCUA_APPLICATION_NAME: 'hmi',
        OPCUA_SESSION_TIMEOUT_MS: '20000',
      });

      expect(config).toEqual({
        host: 'plc.local',
        port: 4841,
        namespaceIndex: 3,
        conversionFailure: 'default',
        applicationName: 'hmi',
        requestedSessionTimeout: 20000,
      });
    });

    it('should fall back to defaults for unset variables', () => {
      const config = loadConfigFromEnv({ OPCUA_HOST: 'plc.local' });

      expect(config.port).toBe(4840);
      expect(config.namespaceIndex).toBe(2);
      expect(config.conversionFailure).toBe('throw');
    });

    it('should require OPCUA_HOST', () => {
      expect(() => loadConfigFromEnv({})).toThrow(ConfigurationError);
    });

    it('should reject an unknown conversion policy', () => {
      expect(() => loadConfigFromEnv({ OPCUA_HOST: 'plc.local', OPCUA_CONVERSION_FAILURE: 'ignore' })).toThrow(
        "OPCUA_CONVERSION_FAILURE must be 'throw' or 'default', got 'ignore'"
      );
    });

    it('should reject a non-numeric port', () => {
      expect(() => loadConfigFromEnv({ OPCUA_HOST: 'plc.local', OPCUA_PORT: 'abc' })).toThrow(ConfigurationError);
    });

    it('should reject numbers followed by other characters', () => {
      expect(() => loadConfigFromEnv({ OPCUA_HOST: 'plc.local', OPCUA_PORT: '4840abc' })).toThrow(ConfigurationError);
      expect(() => loadConfigFromEnv({ OPCUA_HOST: 'plc.local', OPCUA_NAMESPACE_INDEX: '2.5' })).toThrow(
        ConfigurationError
      );
    });
  });
});
