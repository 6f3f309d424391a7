import { ChatSettingsService } from '../config/ChatSettingsService';
import { WardlineConfig } from '../config/EnvironmentManager';
import { DatabaseManager } from '../database/DatabaseManager';
import { ActionDispatcher } from '../moderation/actions/ActionDispatcher';
import { ClassifierGateway } from '../moderation/ai/ClassifierGateway';
import { OllamaProvider } from '../moderation/ai/providers/OllamaProvider';
import { OpenRouterProvider } from '../moderation/ai/providers/OpenRouterProvider';
import { ClassifierCache } from '../moderation/cache/ClassifierCache';
import { EnforcementStateMachine } from '../moderation/enforcement/EnforcementStateMachine';
import { RuleEngine } from '../moderation/filters/RuleEngine';
import { loadRuleSet, RuleSet } from '../moderation/filters/ruleSet';
import { SplitMessageDetector } from '../moderation/filters/SplitMessageDetector';
import { ViolationLedger } from '../moderation/ledger/ViolationLedger';
import { ModerationPipeline } from '../moderation/ModerationPipeline';
import { ModerationStats } from '../moderation/ModerationStats';
import { QuotaGovernor } from '../moderation/quota/QuotaGovernor';
import { BatchSweepProcessor } from '../moderation/sweep/BatchSweepProcessor';
import { DatabaseBacklogSource } from '../moderation/sweep/DatabaseBacklogSource';
import { ApiServer } from '../server/ApiServer';
import { LoggingTransport } from '../transport/LoggingTransport';
import { ErrorHandler } from '../utils/ErrorHandler';
import { ModerationError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { IClassifierProvider } from './interfaces/IClassifierProvider';
import { IModerationTransport } from './interfaces/IModerationTransport';
import { ModerationCommands } from './ModerationCommands';

export interface ClassifierProviders {
  primary: IClassifierProvider;
  secondary?: IClassifierProvider | undefined;
}

export interface ServiceRegistry {
  Config: WardlineConfig;
  Logger: Logger;
  ErrorHandler: ErrorHandler;
  Database: DatabaseManager;
  RuleSet: RuleSet;
  RuleEngine: RuleEngine;
  SplitDetector: SplitMessageDetector;
  ClassifierCache: ClassifierCache;
  QuotaGovernor: QuotaGovernor;
  Providers: ClassifierProviders;
  ClassifierGateway: ClassifierGateway;
  ViolationLedger: ViolationLedger;
  StateMachine: EnforcementStateMachine;
  ChatSettings: ChatSettingsService;
  Transport: IModerationTransport;
  ActionDispatcher: ActionDispatcher;
  ModerationStats: ModerationStats;
  ModerationPipeline: ModerationPipeline;
  ModerationCommands: ModerationCommands;
  BatchSweep: BatchSweepProcessor;
  ApiServer: ApiServer;
}

export type ServiceToken = keyof ServiceRegistry;

// Service tokens
export const TOKENS = {
  Config: 'Config',
  Logger: 'Logger',
  ErrorHandler: 'ErrorHandler',
  Database: 'Database',
  RuleSet: 'RuleSet',
  RuleEngine: 'RuleEngine',
  SplitDetector: 'SplitDetector',
  ClassifierCache: 'ClassifierCache',
  QuotaGovernor: 'QuotaGovernor',
  Providers: 'Providers',
  ClassifierGateway: 'ClassifierGateway',
  ViolationLedger: 'ViolationLedger',
  StateMachine: 'StateMachine',
  ChatSettings: 'ChatSettings',
  Transport: 'Transport',
  ActionDispatcher: 'ActionDispatcher',
  ModerationStats: 'ModerationStats',
  ModerationPipeline: 'ModerationPipeline',
  ModerationCommands: 'ModerationCommands',
  BatchSweep: 'BatchSweep',
  ApiServer: 'ApiServer'
} as const satisfies { [K in ServiceToken]: K };

type Factory<R, K extends keyof R> = (container: IDependencyContainer<R>) => R[K];

export interface IDependencyContainer<R> {
  register<K extends keyof R>(token: K, factory: Factory<R, K>): void;
  resolve<K extends keyof R>(token: K): R[K];
  hasRegistration(token: keyof R): boolean;
}

export class DependencyContainer<R> implements IDependencyContainer<R> {
  private factories: { [K in keyof R]?: Factory<R, K> } = {};
  private singletons: { [K in keyof R]?: R[K] } = {};
  private resolving = new Set<keyof R>();

  register<K extends keyof R>(token: K, factory: Factory<R, K>): void {
    this.factories[token] = factory;
  }

  resolve<K extends keyof R>(token: K): R[K] {
    const existing = this.singletons[token];
    if (existing !== undefined) {
      return existing;
    }

    const factory = this.factories[token];
    if (!factory) {
      throw new Error(`No factory registered for token: ${String(token)}`);
    }
    if (this.resolving.has(token)) {
      throw new Error(`Circular dependency while resolving: ${String(token)}`);
    }

    this.resolving.add(token);
    try {
      const instance = factory(this);
      this.singletons[token] = instance;
      return instance;
    } finally {
      this.resolving.delete(token);
    }
  }

  hasRegistration(token: keyof R): boolean {
    return this.factories[token] !== undefined;
  }

  // Replace a service with a ready instance (tests, alternative transports)
  override<K extends keyof R>(token: K, instance: R[K]): void {
    this.singletons[token] = instance;
  }

  clearSingletons(): void {
    this.singletons = {};
  }
}

export interface ContainerOverrides {
  logger?: Logger;
  transport?: IModerationTransport;
  providers?: ClassifierProviders;
  database?: DatabaseManager;
}

/**
 * AI providers from configuration: the hosted model when an API key is present, the
 * local model as fallback (or as the only provider without a key).
 */
export function createProviders(config: WardlineConfig): ClassifierProviders {
  const local = config.providers.fallback.enabled
    ? new OllamaProvider({ host: config.providers.fallback.host, model: config.providers.fallback.model })
    : undefined;

  if (config.providers.primary.apiKey !== '') {
    const hosted = new OpenRouterProvider({
      baseUrl: config.providers.primary.baseUrl,
      apiKey: config.providers.primary.apiKey,
      model: config.providers.primary.model
    });
    return { primary: hosted, secondary: local };
  }

  if (!local) {
    throw new ModerationError(
      'CONFIG_INVALID',
      'No AI provider configured: set OPENROUTER_API_KEY or enable the local fallback model'
    );
  }
  return { primary: local };
}

export function createContainer(
  config: WardlineConfig,
  overrides: ContainerOverrides = {}
): DependencyContainer<ServiceRegistry> {
  const container = new DependencyContainer<ServiceRegistry>();

  container.register(TOKENS.Config, () => config);

  container.register(TOKENS.Logger, () => overrides.logger ?? new Logger(config.logging.level, config.logging.file));

  container.register(TOKENS.ErrorHandler, (c) => c.resolve(TOKENS.Logger).getErrorHandler());

  container.register(
    TOKENS.Database,
    (c) => overrides.database ?? new DatabaseManager(config.database.path, c.resolve(TOKENS.Logger))
  );

  container.register(TOKENS.RuleSet, () => (config.rulesPath ? loadRuleSet(config.rulesPath) : loadRuleSet()));

  container.register(TOKENS.RuleEngine, (c) => new RuleEngine(c.resolve(TOKENS.Logger), c.resolve(TOKENS.RuleSet)));

  container.register(
    TOKENS.SplitDetector,
    (c) => new SplitMessageDetector(c.resolve(TOKENS.Logger), c.resolve(TOKENS.RuleSet))
  );

  container.register(TOKENS.ClassifierCache, (c) => new ClassifierCache(c.resolve(TOKENS.Logger), config.cache));

  container.register(TOKENS.Providers, () => overrides.providers ?? createProviders(config));

  container.register(TOKENS.QuotaGovernor, (c) => {
    const providers = c.resolve(TOKENS.Providers);
    const governor = new QuotaGovernor(c.resolve(TOKENS.Logger));
    governor.register(providers.primary.name, providers.secondary ? config.quota.primary : config.quota.fallback);
    if (providers.secondary) {
      governor.register(providers.secondary.name, config.quota.fallback);
    }
    return governor;
  });

  container.register(
    TOKENS.ClassifierGateway,
    (c) =>
      new ClassifierGateway(
        c.resolve(TOKENS.Logger),
        c.resolve(TOKENS.ErrorHandler),
        c.resolve(TOKENS.QuotaGovernor),
        c.resolve(TOKENS.Providers),
        { timeoutMs: config.providers.timeoutMs }
      )
  );

  container.register(
    TOKENS.ViolationLedger,
    (c) =>
      new ViolationLedger(c.resolve(TOKENS.Logger), c.resolve(TOKENS.ErrorHandler), c.resolve(TOKENS.Database), {
        inactivityResetMs: config.enforcement.inactivityResetMs,
        cacheSize: config.cache.maxSize
      })
  );

  container.register(TOKENS.StateMachine, () => new EnforcementStateMachine(config.enforcement));

  container.register(
    TOKENS.ChatSettings,
    (c) =>
      new ChatSettingsService(
        c.resolve(TOKENS.Logger),
        c.resolve(TOKENS.ErrorHandler),
        c.resolve(TOKENS.Database),
        config.defaultSecurityMode
      )
  );

  container.register(
    TOKENS.Transport,
    (c) => overrides.transport ?? new LoggingTransport(c.resolve(TOKENS.Logger), { sudoUserId: config.sudoUserId })
  );

  container.register(
    TOKENS.ActionDispatcher,
    (c) => new ActionDispatcher(c.resolve(TOKENS.Logger), c.resolve(TOKENS.ErrorHandler), c.resolve(TOKENS.Transport))
  );

  container.register(TOKENS.ModerationStats, () => new ModerationStats());

  container.register(
    TOKENS.ModerationPipeline,
    (c) =>
      new ModerationPipeline({
        logger: c.resolve(TOKENS.Logger),
        errorHandler: c.resolve(TOKENS.ErrorHandler),
        cache: c.resolve(TOKENS.ClassifierCache),
        rules: c.resolve(TOKENS.RuleEngine),
        splitDetector: c.resolve(TOKENS.SplitDetector),
        gateway: c.resolve(TOKENS.ClassifierGateway),
        governor: c.resolve(TOKENS.QuotaGovernor),
        ledger: c.resolve(TOKENS.ViolationLedger),
        stateMachine: c.resolve(TOKENS.StateMachine),
        settings: c.resolve(TOKENS.ChatSettings),
        dispatcher: c.resolve(TOKENS.ActionDispatcher),
        transport: c.resolve(TOKENS.Transport),
        store: c.resolve(TOKENS.Database),
        stats: c.resolve(TOKENS.ModerationStats),
        sudoUserId: config.sudoUserId
      })
  );

  container.register(
    TOKENS.ModerationCommands,
    (c) =>
      new ModerationCommands({
        logger: c.resolve(TOKENS.Logger),
        errorHandler: c.resolve(TOKENS.ErrorHandler),
        settings: c.resolve(TOKENS.ChatSettings),
        ledger: c.resolve(TOKENS.ViolationLedger),
        pipeline: c.resolve(TOKENS.ModerationPipeline),
        transport: c.resolve(TOKENS.Transport),
        store: c.resolve(TOKENS.Database),
        splitDetector: c.resolve(TOKENS.SplitDetector),
        sudoUserId: config.sudoUserId
      })
  );

  container.register(
    TOKENS.BatchSweep,
    (c) =>
      new BatchSweepProcessor(
        c.resolve(TOKENS.Logger),
        c.resolve(TOKENS.ErrorHandler),
        c.resolve(TOKENS.ModerationPipeline),
        new DatabaseBacklogSource(c.resolve(TOKENS.Database)),
        config.sweep
      )
  );

  container.register(
    TOKENS.ApiServer,
    (c) =>
      new ApiServer(
        c.resolve(TOKENS.ModerationCommands),
        c.resolve(TOKENS.Database),
        config.sweep.enabled ? c.resolve(TOKENS.BatchSweep) : null,
        c.resolve(TOKENS.Logger),
        { port: config.api.port, apiToken: config.api.token }
      )
  );

  return container;
}
