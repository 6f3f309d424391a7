import fs from 'fs';
import path from 'path';
import { ILogger } from '../core/interfaces/ILogger';
import { AdminDeletionPolicy, ADMIN_DELETION_POLICIES, EnforcementPolicy } from '../moderation/enforcement/EnforcementStateMachine';
import { ProviderQuotaConfig } from '../moderation/quota/QuotaGovernor';
import { BatchSweepConfig } from '../moderation/sweep/BatchSweepProcessor';
import { isSecurityMode, SecurityMode } from '../moderation/types';
import { ErrorCategory, ErrorHandler, ErrorSeverity } from '../utils/ErrorHandler';
import { ModerationError } from '../utils/errors';
import { ConfigValidator, isRecord, ValidationResult } from './ConfigValidator';

export interface WardlineConfig {
  sudoUserId: string | undefined;
  defaultSecurityMode: SecurityMode;
  rulesPath: string | undefined;
  database: { path: string };
  cache: { ttlMs: number; maxSize: number; cleanupIntervalMs: number };
  providers: {
    timeoutMs: number;
    primary: { baseUrl: string; apiKey: string; model: string };
    fallback: { host: string; model: string; enabled: boolean };
  };
  quota: { primary: ProviderQuotaConfig; fallback: ProviderQuotaConfig };
  enforcement: EnforcementPolicy & { inactivityResetMs: number };
  sweep: BatchSweepConfig & { enabled: boolean };
  logging: { level: string; file: string | undefined };
  api: { port: number; token: string | undefined };
}

type EnvKind = 'string' | 'number' | 'boolean' | 'number-list';

interface EnvBinding {
  variable: string;
  paths: string[][];
  kind: EnvKind;
}

const ENV_BINDINGS: EnvBinding[] = [
  { variable: 'SUDO_USER_ID', paths: [['sudoUserId']], kind: 'string' },
  { variable: 'DEFAULT_SECURITY_MODE', paths: [['defaultSecurityMode']], kind: 'string' },
  { variable: 'RULES_PATH', paths: [['rulesPath']], kind: 'string' },
  { variable: 'DATABASE_PATH', paths: [['database', 'path']], kind: 'string' },
  { variable: 'CACHE_TTL_MS', paths: [['cache', 'ttlMs']], kind: 'number' },
  { variable: 'CACHE_MAX_SIZE', paths: [['cache', 'maxSize']], kind: 'number' },
  { variable: 'AI_TIMEOUT_MS', paths: [['providers', 'timeoutMs']], kind: 'number' },
  { variable: 'OPENROUTER_BASE_URL', paths: [['providers', 'primary', 'baseUrl']], kind: 'string' },
  { variable: 'OPENROUTER_API_KEY', paths: [['providers', 'primary', 'apiKey']], kind: 'string' },
  { variable: 'PRIMARY_MODEL', paths: [['providers', 'primary', 'model']], kind: 'string' },
  { variable: 'OLLAMA_HOST', paths: [['providers', 'fallback', 'host']], kind: 'string' },
  { variable: 'FALLBACK_MODEL', paths: [['providers', 'fallback', 'model']], kind: 'string' },
  { variable: 'FALLBACK_ENABLED', paths: [['providers', 'fallback', 'enabled']], kind: 'boolean' },
  { variable: 'PRIMARY_QUOTA_LIMIT', paths: [['quota', 'primary', 'limit']], kind: 'number' },
  { variable: 'FALLBACK_QUOTA_LIMIT', paths: [['quota', 'fallback', 'limit']], kind: 'number' },
  {
    variable: 'QUOTA_WINDOW_MS',
    paths: [['quota', 'primary', 'windowMs'], ['quota', 'fallback', 'windowMs']],
    kind: 'number'
  },
  { variable: 'MUTE_DURATION_MS', paths: [['enforcement', 'muteDurationMs']], kind: 'number' },
  { variable: 'TEMP_BAN_DURATIONS_MS', paths: [['enforcement', 'tempBanDurationsMs']], kind: 'number-list' },
  { variable: 'INACTIVITY_RESET_MS', paths: [['enforcement', 'inactivityResetMs']], kind: 'number' },
  { variable: 'ADMIN_DELETION', paths: [['enforcement', 'adminDeletion']], kind: 'string' },
  { variable: 'EXEMPT_ADMINS', paths: [['enforcement', 'exemptAdminsFromAccountActions']], kind: 'boolean' },
  { variable: 'SWEEP_ENABLED', paths: [['sweep', 'enabled']], kind: 'boolean' },
  { variable: 'SWEEP_INTERVAL_MS', paths: [['sweep', 'intervalMs']], kind: 'number' },
  { variable: 'SWEEP_CONCURRENCY', paths: [['sweep', 'concurrency']], kind: 'number' },
  { variable: 'SWEEP_PAGE_SIZE', paths: [['sweep', 'pageSize']], kind: 'number' },
  { variable: 'LOG_LEVEL', paths: [['logging', 'level']], kind: 'string' },
  { variable: 'LOG_FILE', paths: [['logging', 'file']], kind: 'string' },
  { variable: 'PORT', paths: [['api', 'port']], kind: 'number' },
  { variable: 'API_TOKEN', paths: [['api', 'token']], kind: 'string' }
];

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export function getDefaultConfiguration(): WardlineConfig {
  return {
    sudoUserId: undefined,
    defaultSecurityMode: 'medium',
    rulesPath: undefined,
    database: { path: './data/wardline.db' },
    cache: { ttlMs: HOUR_MS, maxSize: 10000, cleanupIntervalMs: 60 * 1000 },
    providers: {
      timeoutMs: 10000,
      primary: { baseUrl: 'https://openrouter.ai/api/v1', apiKey: '', model: 'google/gemini-2.0-flash-exp' },
      fallback: { host: 'http://localhost:11434', model: 'llama3.2:3b', enabled: true }
    },
    quota: {
      primary: { limit: 60, windowMs: 60 * 1000, maxInFlight: 8, liveReserve: 10, liveBackoffMs: 30 * 1000 },
      fallback: { limit: 30, windowMs: 60 * 1000, maxInFlight: 2, liveReserve: 5, liveBackoffMs: 30 * 1000 }
    },
    enforcement: {
      muteDurationMs: HOUR_MS,
      tempBanDurationsMs: [DAY_MS, 3 * DAY_MS, 7 * DAY_MS],
      inactivityResetMs: 7 * DAY_MS,
      adminDeletion: 'critical-only',
      exemptAdminsFromAccountActions: true
    },
    sweep: { enabled: true, intervalMs: 30 * 60 * 1000, concurrency: 2, pageSize: 50 },
    logging: { level: 'info', file: './logs/wardline.log' },
    api: { port: 4000, token: undefined }
  };
}

function parseEnvValue(raw: string, kind: EnvKind): unknown {
  const trimmed = raw.trim();
  switch (kind) {
    case 'number': {
      // Left as a string when unparseable so validation reports the field.
      const parsed = Number(trimmed);
      return trimmed === '' || Number.isNaN(parsed) ? trimmed : parsed;
    }
    case 'boolean':
      if (trimmed.toLowerCase() === 'true') return true;
      if (trimmed.toLowerCase() === 'false') return false;
      return trimmed;
    case 'number-list':
      return trimmed.split(',').map(part => {
        const parsed = Number(part.trim());
        return Number.isNaN(parsed) ? part.trim() : parsed;
      });
    default:
      return trimmed;
  }
}

function setPath(target: Record<string, unknown>, keys: string[], value: unknown): void {
  let cursor = target;
  keys.slice(0, -1).forEach(key => {
    const next = cursor[key];
    if (isRecord(next)) {
      cursor = next;
    } else {
      const created: Record<string, unknown> = {};
      cursor[key] = created;
      cursor = created;
    }
  });
  const last = keys[keys.length - 1];
  if (last !== undefined) {
    cursor[last] = value;
  }
}

/** Deep merge of plain objects; arrays and scalars in `override` replace. */
export function mergeConfigurations(base: unknown, override: unknown): unknown {
  if (!isRecord(base) || !isRecord(override)) {
    return override === undefined ? base : override;
  }

  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    result[key] = isRecord(value) ? mergeConfigurations(result[key], value) : value;
  }
  return result;
}

function section(source: unknown, key: string): Record<string, unknown> {
  if (!isRecord(source)) {
    return {};
  }
  const value = source[key];
  return isRecord(value) ? value : {};
}

function readNumber(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === 'number' ? value : fallback;
}

function readString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : fallback;
}

function readOptionalString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === 'boolean' ? value : fallback;
}

function readQuota(source: Record<string, unknown>, fallback: ProviderQuotaConfig): ProviderQuotaConfig {
  return {
    limit: readNumber(source, 'limit', fallback.limit),
    windowMs: readNumber(source, 'windowMs', fallback.windowMs),
    maxInFlight: readNumber(source, 'maxInFlight', fallback.maxInFlight),
    liveReserve: readNumber(source, 'liveReserve', fallback.liveReserve),
    liveBackoffMs: readNumber(source, 'liveBackoffMs', fallback.liveBackoffMs)
  };
}

/**
 * Configuration from defaults, then the optional JSON file, then environment variables
 * (typically loaded by dotenv). The merged result is validated as a whole.
 */
export class EnvironmentManager {
  private logger: ILogger;
  private errorHandler: ErrorHandler;
  private configValidator: ConfigValidator;
  private config: WardlineConfig | null = null;
  private configPath: string;
  private env: NodeJS.ProcessEnv;

  constructor(
    logger: ILogger,
    errorHandler: ErrorHandler,
    configPath: string = './config/wardline.json',
    env: NodeJS.ProcessEnv = process.env
  ) {
    this.logger = logger;
    this.errorHandler = errorHandler;
    this.configPath = path.resolve(configPath);
    this.env = env;
    this.configValidator = new ConfigValidator(logger, errorHandler);
  }

  async loadConfiguration(): Promise<WardlineConfig> {
    this.logger.info('Loading configuration', {
      component: 'environment_manager',
      configPath: this.configPath
    });

    const defaults = getDefaultConfiguration();
    const fileConfig = this.loadConfigurationFile();
    const merged = mergeConfigurations(mergeConfigurations(defaults, fileConfig), this.environmentOverrides());

    const validationResult = this.configValidator.validate(merged, 'wardline_config');
    if (!validationResult.isValid) {
      const errorMessage = `Configuration validation failed: ${describeErrors(validationResult)}`;
      this.errorHandler.handleValidationError(errorMessage, 'configuration', undefined, {
        operation: 'load_config',
        component: 'environment_manager'
      });
      throw new ModerationError('CONFIG_INVALID', errorMessage);
    }

    if (validationResult.warnings.length > 0) {
      this.logger.warn('Configuration warnings detected', {
        component: 'environment_manager',
        warnings: validationResult.warnings
      });
    }

    this.config = this.resolve(merged, defaults);
    this.logger.info('Configuration loaded', {
      component: 'environment_manager',
      defaultSecurityMode: this.config.defaultSecurityMode,
      primaryProviderEnabled: this.config.providers.primary.apiKey !== '',
      fallbackProviderEnabled: this.config.providers.fallback.enabled
    });

    return this.config;
  }

  getConfiguration(): WardlineConfig {
    if (!this.config) {
      throw new ModerationError('CONFIG_INVALID', 'Configuration not loaded. Call loadConfiguration() first.');
    }
    return this.config;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getEnvironmentSpecificConfig(): {
    environment: string;
    isDevelopment: boolean;
    isProduction: boolean;
    isTest: boolean;
  } {
    const environment = this.env['NODE_ENV'] || 'production';

    return {
      environment,
      isDevelopment: environment === 'development',
      isProduction: environment === 'production',
      isTest: environment === 'test'
    };
  }

  private loadConfigurationFile(): unknown {
    if (!fs.existsSync(this.configPath)) {
      this.logger.debug('Configuration file not found, using defaults', {
        component: 'environment_manager',
        configPath: this.configPath
      });
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
      if (!isRecord(parsed)) {
        throw new Error('Configuration file must contain a JSON object');
      }
      return parsed;
    } catch (error) {
      this.errorHandler.handleError(
        error instanceof Error ? error : new Error(String(error)),
        ErrorCategory.CONFIGURATION,
        ErrorSeverity.HIGH,
        { operation: 'parse_config_file', component: 'environment_manager', metadata: { configPath: this.configPath } }
      );
      throw new ModerationError('CONFIG_INVALID', `Unreadable configuration file ${this.configPath}`, {
        cause: error
      });
    }
  }

  private environmentOverrides(): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};
    for (const binding of ENV_BINDINGS) {
      const raw = this.env[binding.variable];
      if (raw === undefined || raw === '') {
        continue;
      }
      const value = parseEnvValue(raw, binding.kind);
      for (const keys of binding.paths) {
        setPath(overrides, keys, value);
      }
    }
    return overrides;
  }

  private resolve(merged: unknown, defaults: WardlineConfig): WardlineConfig {
    const root = isRecord(merged) ? merged : {};
    const providers = section(root, 'providers');
    const primary = section(providers, 'primary');
    const fallback = section(providers, 'fallback');
    const quota = section(root, 'quota');
    const enforcement = section(root, 'enforcement');
    const sweep = section(root, 'sweep');
    const cache = section(root, 'cache');
    const logging = section(root, 'logging');
    const api = section(root, 'api');

    const mode = root['defaultSecurityMode'];
    const adminDeletion = enforcement['adminDeletion'];
    const tempBans = enforcement['tempBanDurationsMs'];

    return {
      sudoUserId: readOptionalString(root, 'sudoUserId'),
      defaultSecurityMode: isSecurityMode(mode) ? mode : defaults.defaultSecurityMode,
      rulesPath: readOptionalString(root, 'rulesPath'),
      database: { path: readString(section(root, 'database'), 'path', defaults.database.path) },
      cache: {
        ttlMs: readNumber(cache, 'ttlMs', defaults.cache.ttlMs),
        maxSize: readNumber(cache, 'maxSize', defaults.cache.maxSize),
        cleanupIntervalMs: readNumber(cache, 'cleanupIntervalMs', defaults.cache.cleanupIntervalMs)
      },
      providers: {
        timeoutMs: readNumber(providers, 'timeoutMs', defaults.providers.timeoutMs),
        primary: {
          baseUrl: readString(primary, 'baseUrl', defaults.providers.primary.baseUrl),
          apiKey: readString(primary, 'apiKey', defaults.providers.primary.apiKey),
          model: readString(primary, 'model', defaults.providers.primary.model)
        },
        fallback: {
          host: readString(fallback, 'host', defaults.providers.fallback.host),
          model: readString(fallback, 'model', defaults.providers.fallback.model),
          enabled: readBoolean(fallback, 'enabled', defaults.providers.fallback.enabled)
        }
      },
      quota: {
        primary: readQuota(section(quota, 'primary'), defaults.quota.primary),
        fallback: readQuota(section(quota, 'fallback'), defaults.quota.fallback)
      },
      enforcement: {
        muteDurationMs: readNumber(enforcement, 'muteDurationMs', defaults.enforcement.muteDurationMs),
        tempBanDurationsMs: Array.isArray(tempBans)
          ? tempBans.filter((value: unknown): value is number => typeof value === 'number')
          : defaults.enforcement.tempBanDurationsMs,
        inactivityResetMs: readNumber(enforcement, 'inactivityResetMs', defaults.enforcement.inactivityResetMs),
        adminDeletion: isAdminDeletionPolicy(adminDeletion) ? adminDeletion : defaults.enforcement.adminDeletion,
        exemptAdminsFromAccountActions: readBoolean(
          enforcement,
          'exemptAdminsFromAccountActions',
          defaults.enforcement.exemptAdminsFromAccountActions
        )
      },
      sweep: {
        enabled: readBoolean(sweep, 'enabled', defaults.sweep.enabled),
        intervalMs: readNumber(sweep, 'intervalMs', defaults.sweep.intervalMs),
        concurrency: readNumber(sweep, 'concurrency', defaults.sweep.concurrency),
        pageSize: readNumber(sweep, 'pageSize', defaults.sweep.pageSize)
      },
      logging: {
        level: readString(logging, 'level', defaults.logging.level),
        file: readOptionalString(logging, 'file')
      },
      api: {
        port: readNumber(api, 'port', defaults.api.port),
        token: readOptionalString(api, 'token')
      }
    };
  }
}

function isAdminDeletionPolicy(value: unknown): value is AdminDeletionPolicy {
  return ADMIN_DELETION_POLICIES.some(policy => policy === value);
}

function describeErrors(result: ValidationResult): string {
  return result.errors
    .map(error => (error.expected ? `${error.field}: ${error.message} (expected ${error.expected})` : `${error.field}: ${error.message}`))
    .join(', ');
}
