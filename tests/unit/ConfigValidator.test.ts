import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { ConfigValidator, ValidationSchema } from '../../bot/src/config/ConfigValidator';
import { getDefaultConfiguration, mergeConfigurations } from '../../bot/src/config/EnvironmentManager';
import { ErrorHandler } from '../../bot/src/utils/ErrorHandler';
import { createTestLogger } from '../setup';

describe('ConfigValidator', () => {
  let configValidator: ConfigValidator;
  let errorHandler: ErrorHandler;

  const withOverride = (override: unknown) => mergeConfigurations(getDefaultConfiguration(), override);

  beforeEach(() => {
    const logger = createTestLogger();
    errorHandler = new ErrorHandler(logger);
    configValidator = new ConfigValidator(logger, errorHandler);
  });

  afterEach(() => {
    errorHandler.destroy();
  });

  describe('Wardline configuration', () => {
    test('should accept the defaults', () => {
      const result = configValidator.validate(getDefaultConfiguration(), 'wardline_config');

      expect(result.isValid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
    });

    test('should reject an unknown default security mode', () => {
      const result = configValidator.validate(withOverride({ defaultSecurityMode: 'aggressive' }), 'wardline_config');

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual([
        {
          field: 'defaultSecurityMode',
          message: 'Invalid enum value',
          value: 'aggressive',
          expected: 'one of: low, medium, extreme'
        }
      ]);
    });

    test('should enforce numeric bounds in nested sections', () => {
      const result = configValidator.validate(withOverride({ cache: { ttlMs: 5 } }), 'wardline_config');

      expect(result.errors).toEqual([
        { field: 'cache.ttlMs', message: 'Value below minimum', value: 5, expected: '>= 1000' }
      ]);
    });

    test('should validate every temp-ban duration', () => {
      const empty = configValidator.validate(withOverride({ enforcement: { tempBanDurationsMs: [] } }), 'wardline_config');
      expect(empty.errors[0]).toMatchObject({ field: 'enforcement.tempBanDurationsMs', message: 'Length below minimum' });

      const tooShort = configValidator.validate(
        withOverride({ enforcement: { tempBanDurationsMs: [86400000, 10] } }),
        'wardline_config'
      );
      expect(tooShort.errors).toEqual([
        { field: 'enforcement.tempBanDurationsMs[1]', message: 'Value below minimum', value: 10, expected: '>= 1000' }
      ]);
    });

    test('should require provider URLs to be http', () => {
      const result = configValidator.validate(
        withOverride({ providers: { primary: { baseUrl: 'ftp://models.example' } } }),
        'wardline_config'
      );

      expect(result.errors.map(error => error.field)).toEqual(['providers.primary.baseUrl']);
      expect(result.errors[0].message).toBe("Value doesn't match pattern");
    });

    test('should report missing required sections', () => {
      const config = getDefaultConfiguration();
      const { api: _api, ...withoutApi } = config;

      const result = configValidator.validate(withoutApi, 'wardline_config');

      expect(result.errors).toEqual([{ field: 'api', message: 'Required field is missing', expected: 'object value' }]);
    });

    test('should warn about unexpected fields', () => {
      const result = configValidator.validate(withOverride({ theme: 'dark' }), 'wardline_config');

      expect(result.isValid).toBe(true);
      expect(result.warnings).toEqual([
        { field: 'theme', message: 'Unexpected field', suggestion: 'Remove this field or add it to the schema' }
      ]);
    });

    test('should reject a configuration that is not an object', () => {
      const result = configValidator.validate('medium', 'wardline_config');
      expect(result.errors).toEqual([
        { field: '(root)', message: 'Invalid type', value: 'medium', expected: 'object' }
      ]);
    });
  });

  describe('Schema registry', () => {
    test('should report unknown schemas', () => {
      const result = configValidator.validate({}, 'missing');

      expect(result.isValid).toBe(false);
      expect(result.errors[0].message).toBe('Unknown schema: missing');
    });

    test('should validate custom schemas', () => {
      const schema: ValidationSchema = {
        name: { type: 'string', required: true, min: 2 },
        port: { type: 'number', custom: value => (value === 22 ? 'Port 22 is reserved' : true) }
      };
      configValidator.registerSchema('service', schema);

      expect(configValidator.getSchemas()).toEqual(['wardline_config', 'service']);
      expect(configValidator.validate({ name: 'api', port: 8080 }, 'service').isValid).toBe(true);
      expect(configValidator.validate({ name: 'a', port: 22 }, 'service').errors.map(error => error.message)).toEqual([
        'Length below minimum',
        'Port 22 is reserved'
      ]);
    });
  });
});
