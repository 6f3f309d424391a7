/**
 * Shared test doubles: an in-memory moderation store, a recording transport and
 * scripted AI providers. Nothing here opens a socket.
 */

import { IClassifierProvider, NormalizedClassification } from '../bot/src/core/interfaces/IClassifierProvider';
import {
  IModerationStore,
  ModerationActionEntry,
  PendingMessage
} from '../bot/src/core/interfaces/IModerationStore';
import { BanOptions, IModerationTransport } from '../bot/src/core/interfaces/IModerationTransport';
import { ChatSettingsService } from '../bot/src/config/ChatSettingsService';
import { ActionDispatcher } from '../bot/src/moderation/actions/ActionDispatcher';
import { ClassifierGateway } from '../bot/src/moderation/ai/ClassifierGateway';
import { ClassifierCache } from '../bot/src/moderation/cache/ClassifierCache';
import { EnforcementStateMachine } from '../bot/src/moderation/enforcement/EnforcementStateMachine';
import { RuleEngine } from '../bot/src/moderation/filters/RuleEngine';
import { loadRuleSet } from '../bot/src/moderation/filters/ruleSet';
import { SplitMessageDetector } from '../bot/src/moderation/filters/SplitMessageDetector';
import { ViolationLedger } from '../bot/src/moderation/ledger/ViolationLedger';
import { ModerationPipeline } from '../bot/src/moderation/ModerationPipeline';
import { ProviderQuotaConfig, QuotaGovernor } from '../bot/src/moderation/quota/QuotaGovernor';
import { Message, recordKey, SecurityMode, ViolationRecord } from '../bot/src/moderation/types';
import { ErrorHandler } from '../bot/src/utils/ErrorHandler';
import { Logger } from '../bot/src/utils/Logger';

export function createTestLogger(): Logger {
  return Logger.create('test');
}

export function createMockMessage(overrides: Partial<Message> = {}): Message {
  return {
    messageId: 'msg-1',
    chatId: '1001',
    userId: '55',
    text: 'hello everyone',
    timestamp: new Date('2024-05-01T12:00:00Z'),
    role: 'regular',
    isSudo: false,
    ...overrides
  };
}

export type StoreOperation =
  | 'getSecurityMode'
  | 'setSecurityMode'
  | 'getViolationRecord'
  | 'saveViolationRecord'
  | 'deleteViolationRecord'
  | 'logModerationAction';

export class InMemoryStore implements IModerationStore {
  modes = new Map<string, SecurityMode>();
  records = new Map<string, ViolationRecord>();
  actions: ModerationActionEntry[] = [];
  checkpoints = new Map<string, number>();
  pending: PendingMessage[] = [];
  failing = new Set<StoreOperation>();
  saveCalls = 0;
  private nextCursor = 1;

  private guard(operation: StoreOperation): void {
    if (this.failing.has(operation)) {
      throw new Error(`store offline: ${operation}`);
    }
  }

  async getSecurityMode(chatId: string): Promise<SecurityMode | null> {
    this.guard('getSecurityMode');
    return this.modes.get(chatId) ?? null;
  }

  async setSecurityMode(chatId: string, mode: SecurityMode): Promise<void> {
    this.guard('setSecurityMode');
    this.modes.set(chatId, mode);
  }

  async getViolationRecord(chatId: string, userId: string): Promise<ViolationRecord | null> {
    this.guard('getViolationRecord');
    const record = this.records.get(recordKey(chatId, userId));
    return record ? { ...record } : null;
  }

  async saveViolationRecord(record: ViolationRecord): Promise<void> {
    this.saveCalls++;
    this.guard('saveViolationRecord');
    this.records.set(recordKey(record.chatId, record.userId), { ...record });
  }

  async deleteViolationRecord(chatId: string, userId: string): Promise<void> {
    this.guard('deleteViolationRecord');
    this.records.delete(recordKey(chatId, userId));
  }

  async logModerationAction(entry: ModerationActionEntry): Promise<void> {
    this.guard('logModerationAction');
    this.actions.push(entry);
  }

  async getRecentActions(chatId: string, limit: number): Promise<ModerationActionEntry[]> {
    return this.actions
      .filter(entry => entry.chatId === chatId)
      .reverse()
      .slice(0, limit);
  }

  async getSweepCheckpoint(name: string): Promise<number> {
    return this.checkpoints.get(name) ?? 0;
  }

  async setSweepCheckpoint(name: string, cursor: number): Promise<void> {
    this.checkpoints.set(name, cursor);
  }

  async enqueuePendingMessage(message: Message): Promise<number> {
    const cursor = this.nextCursor++;
    this.pending.push({ cursor, message });
    return cursor;
  }

  async fetchPendingMessages(afterCursor: number, limit: number): Promise<PendingMessage[]> {
    return this.pending.filter(item => item.cursor > afterCursor).slice(0, limit);
  }

  async prunePendingMessages(upToCursor: number): Promise<number> {
    const before = this.pending.length;
    this.pending = this.pending.filter(item => item.cursor > upToCursor);
    return before - this.pending.length;
  }
}

export interface TransportCall {
  operation: 'delete' | 'mute' | 'ban' | 'warn' | 'unban';
  chatId: string;
  target: string;
  detail?: number | string | BanOptions;
}

export class FakeTransport implements IModerationTransport {
  calls: TransportCall[] = [];
  admins = new Set<string>();
  sudoUsers = new Set<string>();
  failing = new Set<TransportCall['operation']>();
  adminLookupFails = false;
  notifications: Array<{ chatId: string; text: string }> = [];
  notifyFails = false;
  /** Latency for successive isAdmin calls, in milliseconds. */
  adminDelaysMs: number[] = [];

  async isAdmin(chatId: string, userId: string): Promise<boolean> {
    const delay = this.adminDelaysMs.shift();
    if (delay) {
      await new Promise(resolve => setTimeout(resolve, delay));
    }
    if (this.adminLookupFails) {
      throw new Error('admin lookup failed');
    }
    return this.admins.has(recordKey(chatId, userId));
  }

  isSudo(userId: string): boolean {
    return this.sudoUsers.has(userId);
  }

  async deleteMessage(chatId: string, messageId: string): Promise<void> {
    this.record({ operation: 'delete', chatId, target: messageId });
  }

  async mute(chatId: string, userId: string, durationMs: number): Promise<void> {
    this.record({ operation: 'mute', chatId, target: userId, detail: durationMs });
  }

  async ban(chatId: string, userId: string, options: BanOptions): Promise<void> {
    this.record({ operation: 'ban', chatId, target: userId, detail: options });
  }

  async warn(chatId: string, userId: string, reason: string): Promise<void> {
    this.record({ operation: 'warn', chatId, target: userId, detail: reason });
  }

  async unban(chatId: string, userId: string): Promise<void> {
    this.record({ operation: 'unban', chatId, target: userId });
  }

  async notifyAdmins(chatId: string, text: string): Promise<void> {
    if (this.notifyFails) {
      throw new Error('notification failed');
    }
    this.notifications.push({ chatId, text });
  }

  operations(): Array<TransportCall['operation']> {
    return this.calls.map(call => call.operation);
  }

  private record(call: TransportCall): void {
    if (this.failing.has(call.operation)) {
      throw new Error(`transport rejected ${call.operation}`);
    }
    this.calls.push(call);
  }
}

export type ProviderStep =
  | { kind: 'result'; classification: NormalizedClassification }
  | { kind: 'error'; error: Error }
  | { kind: 'hang' };

/**
 * Provider that replays scripted steps; the last step repeats. `hang` never settles on
 * its own and rejects only when the signal aborts.
 */
export class FakeProvider implements IClassifierProvider {
  readonly name: string;
  calls: string[] = [];
  private steps: ProviderStep[];

  constructor(name: string, steps: ProviderStep[]) {
    this.name = name;
    this.steps = steps;
  }

  async classify(text: string, signal: AbortSignal): Promise<unknown> {
    this.calls.push(text);
    const step = this.steps.length > 1 ? this.steps.shift() : this.steps[0];
    if (!step) {
      throw new Error(`${this.name} has no scripted response`);
    }

    switch (step.kind) {
      case 'result':
        return step.classification;
      case 'error':
        throw step.error;
      case 'hang':
        return new Promise((_, reject) => {
          signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        });
    }
  }

  normalize(raw: unknown): NormalizedClassification {
    if (!isClassification(raw)) {
      throw new Error(`${this.name} returned a malformed payload`);
    }
    return raw;
  }
}

function isClassification(value: unknown): value is NormalizedClassification {
  return (
    typeof value === 'object' &&
    value !== null &&
    'category' in value &&
    'severity' in value &&
    'confidence' in value &&
    'reason' in value
  );
}

export function classification(overrides: Partial<NormalizedClassification> = {}): NormalizedClassification {
  return {
    category: 'none',
    severity: 'none',
    confidence: 0.9,
    needsReview: false,
    reason: 'looks fine',
    ...overrides
  };
}

export function resultStep(overrides: Partial<NormalizedClassification> = {}): ProviderStep {
  return { kind: 'result', classification: classification(overrides) };
}

export interface PipelineHarness {
  logger: Logger;
  errorHandler: ErrorHandler;
  store: InMemoryStore;
  transport: FakeTransport;
  primary: FakeProvider;
  fallback: FakeProvider;
  cache: ClassifierCache;
  governor: QuotaGovernor;
  ledger: ViolationLedger;
  settings: ChatSettingsService;
  splitDetector: SplitMessageDetector;
  pipeline: ModerationPipeline;
  /** Stops the timers the harness started. */
  dispose: () => void;
}

export interface PipelineHarnessOptions {
  primarySteps?: ProviderStep[];
  fallbackSteps?: ProviderStep[];
  quota?: Partial<ProviderQuotaConfig>;
  timeoutMs?: number;
  sudoUserId?: string;
}

/**
 * The full moderation pipeline over the in-memory store, the recording transport and
 * two scripted providers named "primary" and "fallback".
 */
export function createPipelineHarness(options: PipelineHarnessOptions = {}): PipelineHarness {
  const logger = createTestLogger();
  const errorHandler = logger.getErrorHandler();
  const store = new InMemoryStore();
  const transport = new FakeTransport();
  const primary = new FakeProvider('primary', options.primarySteps ?? [resultStep()]);
  const fallback = new FakeProvider('fallback', options.fallbackSteps ?? [resultStep()]);

  const ruleSet = loadRuleSet();
  const cache = new ClassifierCache(logger, { cleanupIntervalMs: 0 });
  const governor = new QuotaGovernor(logger, {
    primary: options.quota ?? {},
    fallback: options.quota ?? {}
  });
  const gateway = new ClassifierGateway(logger, errorHandler, governor, { primary, secondary: fallback }, {
    timeoutMs: options.timeoutMs ?? 1000
  });
  const ledger = new ViolationLedger(logger, errorHandler, store);
  const settings = new ChatSettingsService(logger, errorHandler, store, 'medium');
  const splitDetector = new SplitMessageDetector(logger, ruleSet);

  const pipeline = new ModerationPipeline({
    logger,
    errorHandler,
    cache,
    rules: new RuleEngine(logger, ruleSet),
    splitDetector,
    gateway,
    governor,
    ledger,
    stateMachine: new EnforcementStateMachine(),
    settings,
    dispatcher: new ActionDispatcher(logger, errorHandler, transport),
    transport,
    store,
    sudoUserId: options.sudoUserId
  });

  return {
    logger,
    errorHandler,
    store,
    transport,
    primary,
    fallback,
    cache,
    governor,
    ledger,
    settings,
    splitDetector,
    pipeline,
    dispose: () => {
      cache.destroy();
      ledger.stop();
      governor.stop();
      errorHandler.destroy();
    }
  };
}
