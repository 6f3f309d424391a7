import { ILogger } from '../core/interfaces/ILogger';
import { ErrorHandler } from '../utils/ErrorHandler';

export type ValueType = 'string' | 'number' | 'boolean' | 'object' | 'array';

export interface ValidationRule {
  type: ValueType;
  required?: boolean;
  /** Numbers: minimum value. Strings and arrays: minimum length. */
  min?: number;
  max?: number;
  pattern?: RegExp;
  enum?: readonly (string | number)[];
  custom?: (value: unknown) => boolean | string;
  nested?: ValidationSchema;
  /** Rule applied to every element of an array. */
  items?: ValidationRule;
}

export interface ValidationSchema {
  [field: string]: ValidationRule;
}

export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
  expected?: string;
}

export interface ValidationWarning {
  field: string;
  message: string;
  suggestion?: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const DURATION: ValidationRule = { type: 'number', min: 0 };

const PROVIDER_QUOTA_SCHEMA: ValidationSchema = {
  limit: { type: 'number', required: true, min: 1 },
  windowMs: { type: 'number', required: true, min: 1000 },
  maxInFlight: { type: 'number', required: true, min: 1 },
  liveReserve: { type: 'number', required: true, min: 0 },
  liveBackoffMs: DURATION
};

export const WARDLINE_CONFIG_SCHEMA: ValidationSchema = {
  sudoUserId: { type: 'string', min: 1 },
  defaultSecurityMode: { type: 'string', required: true, enum: ['low', 'medium', 'extreme'] },
  rulesPath: { type: 'string', min: 1 },
  database: {
    type: 'object',
    required: true,
    nested: {
      path: { type: 'string', required: true, min: 1 }
    }
  },
  cache: {
    type: 'object',
    required: true,
    nested: {
      ttlMs: { type: 'number', required: true, min: 1000 },
      maxSize: { type: 'number', required: true, min: 1, max: 1000000 },
      cleanupIntervalMs: DURATION
    }
  },
  providers: {
    type: 'object',
    required: true,
    nested: {
      timeoutMs: { type: 'number', required: true, min: 100, max: 120000 },
      primary: {
        type: 'object',
        required: true,
        nested: {
          baseUrl: { type: 'string', required: true, pattern: /^https?:\/\// },
          apiKey: { type: 'string' },
          model: { type: 'string', required: true, min: 1 }
        }
      },
      fallback: {
        type: 'object',
        required: true,
        nested: {
          host: { type: 'string', required: true, pattern: /^https?:\/\// },
          model: { type: 'string', required: true, min: 1 },
          enabled: { type: 'boolean' }
        }
      }
    }
  },
  quota: {
    type: 'object',
    required: true,
    nested: {
      primary: { type: 'object', required: true, nested: PROVIDER_QUOTA_SCHEMA },
      fallback: { type: 'object', required: true, nested: PROVIDER_QUOTA_SCHEMA }
    }
  },
  enforcement: {
    type: 'object',
    required: true,
    nested: {
      muteDurationMs: { type: 'number', required: true, min: 1000 },
      tempBanDurationsMs: { type: 'array', required: true, min: 1, items: { type: 'number', min: 1000 } },
      inactivityResetMs: { type: 'number', required: true, min: 60000 },
      adminDeletion: { type: 'string', required: true, enum: ['critical-only', 'all', 'never'] },
      exemptAdminsFromAccountActions: { type: 'boolean', required: true }
    }
  },
  sweep: {
    type: 'object',
    required: true,
    nested: {
      enabled: { type: 'boolean', required: true },
      intervalMs: { type: 'number', required: true, min: 1000 },
      concurrency: { type: 'number', required: true, min: 1, max: 32 },
      pageSize: { type: 'number', required: true, min: 1, max: 1000 }
    }
  },
  logging: {
    type: 'object',
    required: true,
    nested: {
      level: { type: 'string', required: true, enum: ['error', 'warn', 'info', 'debug'] },
      file: { type: 'string' }
    }
  },
  api: {
    type: 'object',
    required: true,
    nested: {
      port: { type: 'number', required: true, min: 0, max: 65535 },
      token: { type: 'string' }
    }
  }
};

export class ConfigValidator {
  private logger: ILogger;
  private errorHandler: ErrorHandler;
  private schemas = new Map<string, ValidationSchema>();

  constructor(logger: ILogger, errorHandler: ErrorHandler) {
    this.logger = logger;
    this.errorHandler = errorHandler;

    this.registerSchema('wardline_config', WARDLINE_CONFIG_SCHEMA);
  }

  registerSchema(name: string, schema: ValidationSchema): void {
    this.schemas.set(name, schema);
    this.logger.debug('Validation schema registered', {
      component: 'config_validator',
      schemaName: name,
      fieldsCount: Object.keys(schema).length
    });
  }

  validate(config: unknown, schemaName: string): ValidationResult {
    const schema = this.schemas.get(schemaName);
    if (!schema) {
      this.errorHandler.handleValidationError(`Unknown schema: ${schemaName}`, 'schema', schemaName);
      return {
        isValid: false,
        errors: [{ field: 'schema', message: `Unknown schema: ${schemaName}` }],
        warnings: []
      };
    }

    const result = this.validateObject(config, schema, '');

    if (!result.isValid) {
      this.logger.warn('Configuration validation failed', {
        component: 'config_validator',
        schemaName,
        errors: result.errors
      });
    } else {
      this.logger.debug('Configuration validated', {
        component: 'config_validator',
        schemaName,
        warningsCount: result.warnings.length
      });
    }

    return result;
  }

  getSchemas(): string[] {
    return Array.from(this.schemas.keys());
  }

  getSchema(name: string): ValidationSchema | undefined {
    return this.schemas.get(name);
  }

  private validateObject(value: unknown, schema: ValidationSchema, path: string): ValidationResult {
    const errors: ValidationError[] = [];
    const warnings: ValidationWarning[] = [];

    if (!isRecord(value)) {
      errors.push({ field: path || '(root)', message: 'Invalid type', value, expected: 'object' });
      return { isValid: false, errors, warnings };
    }

    for (const [fieldName, rule] of Object.entries(schema)) {
      const fullPath = path ? `${path}.${fieldName}` : fieldName;
      const fieldValue = value[fieldName];

      if (fieldValue === undefined || fieldValue === null) {
        if (rule.required) {
          errors.push({ field: fullPath, message: 'Required field is missing', expected: `${rule.type} value` });
        }
        continue;
      }

      const fieldResult = this.validateField(fieldValue, rule, fullPath);
      errors.push(...fieldResult.errors);
      warnings.push(...fieldResult.warnings);
    }

    for (const fieldName of Object.keys(value)) {
      if (!(fieldName in schema)) {
        warnings.push({
          field: path ? `${path}.${fieldName}` : fieldName,
          message: 'Unexpected field',
          suggestion: 'Remove this field or add it to the schema'
        });
      }
    }

    return { isValid: errors.length === 0, errors, warnings };
  }

  private validateField(value: unknown, rule: ValidationRule, path: string): ValidationResult {
    const errors: ValidationError[] = [];
    const warnings: ValidationWarning[] = [];

    if (!this.validateType(value, rule.type)) {
      errors.push({ field: path, message: 'Invalid type', value, expected: rule.type });
      return { isValid: false, errors, warnings };
    }

    if (typeof value === 'number') {
      if (rule.min !== undefined && value < rule.min) {
        errors.push({ field: path, message: 'Value below minimum', value, expected: `>= ${rule.min}` });
      }
      if (rule.max !== undefined && value > rule.max) {
        errors.push({ field: path, message: 'Value above maximum', value, expected: `<= ${rule.max}` });
      }
    }

    if (typeof value === 'string' || Array.isArray(value)) {
      const length = value.length;
      if (rule.min !== undefined && length < rule.min) {
        errors.push({
          field: path,
          message: 'Length below minimum',
          value: length,
          expected: `>= ${rule.min} characters/items`
        });
      }
      if (rule.max !== undefined && length > rule.max) {
        errors.push({
          field: path,
          message: 'Length above maximum',
          value: length,
          expected: `<= ${rule.max} characters/items`
        });
      }
    }

    if (typeof value === 'string' && rule.pattern && !rule.pattern.test(value)) {
      errors.push({ field: path, message: "Value doesn't match pattern", value, expected: rule.pattern.toString() });
    }

    if (rule.enum && !rule.enum.some(allowed => allowed === value)) {
      errors.push({ field: path, message: 'Invalid enum value', value, expected: `one of: ${rule.enum.join(', ')}` });
    }

    if (rule.type === 'object' && rule.nested) {
      const nestedResult = this.validateObject(value, rule.nested, path);
      errors.push(...nestedResult.errors);
      warnings.push(...nestedResult.warnings);
    }

    const itemRule = rule.items;
    if (Array.isArray(value) && itemRule) {
      value.forEach((item: unknown, index) => {
        const itemResult = this.validateField(item, itemRule, `${path}[${index}]`);
        errors.push(...itemResult.errors);
        warnings.push(...itemResult.warnings);
      });
    }

    if (rule.custom) {
      const customResult = rule.custom(value);
      if (typeof customResult === 'string') {
        errors.push({ field: path, message: customResult, value });
      } else if (!customResult) {
        errors.push({ field: path, message: 'Custom validation failed', value });
      }
    }

    return { isValid: errors.length === 0, errors, warnings };
  }

  private validateType(value: unknown, expectedType: ValueType): boolean {
    switch (expectedType) {
      case 'string':
        return typeof value === 'string';
      case 'number':
        return typeof value === 'number' && !Number.isNaN(value);
      case 'boolean':
        return typeof value === 'boolean';
      case 'object':
        return isRecord(value);
      case 'array':
        return Array.isArray(value);
      default:
        return false;
    }
  }
}
