import { ChatSettingsService } from '../config/ChatSettingsService';
import { ILogger } from '../core/interfaces/ILogger';
import { IModerationPipeline, ModerationStatsSnapshot, ProcessOptions } from '../core/interfaces/IModerationPipeline';
import { IModerationStore } from '../core/interfaces/IModerationStore';
import { IModerationTransport } from '../core/interfaces/IModerationTransport';
import { ErrorCategory, ErrorHandler, ErrorSeverity } from '../utils/ErrorHandler';
import { ClassificationUnavailable } from '../utils/errors';
import { KeyedMutex, Ticket } from '../utils/KeyedMutex';
import { ActionDispatcher } from './actions/ActionDispatcher';
import { ClassifierGateway } from './ai/ClassifierGateway';
import { ClassifierCache } from './cache/ClassifierCache';
import { fingerprint } from './cache/fingerprint';
import { EnforcementStateMachine } from './enforcement/EnforcementStateMachine';
import { RuleEngine } from './filters/RuleEngine';
import { SplitMessageDetector } from './filters/SplitMessageDetector';
import { ViolationLedger } from './ledger/ViolationLedger';
import { ModerationStats } from './ModerationStats';
import { QuotaGovernor } from './quota/QuotaGovernor';
import {
  EnforcementAction,
  Message,
  ModerationOutcome,
  NO_ACTION,
  ProcessingPriority,
  recordKey,
  Verdict,
  ViolationRecord
} from './types';

export interface ModerationPipelineDependencies {
  logger: ILogger;
  errorHandler: ErrorHandler;
  cache: ClassifierCache;
  rules: RuleEngine;
  splitDetector?: SplitMessageDetector | undefined;
  gateway: ClassifierGateway;
  governor: QuotaGovernor;
  ledger: ViolationLedger;
  stateMachine: EnforcementStateMachine;
  settings: ChatSettingsService;
  dispatcher: ActionDispatcher;
  transport: IModerationTransport;
  store: IModerationStore;
  stats?: ModerationStats | undefined;
  sudoUserId?: string | undefined;
}

type Classification = Verdict | 'deferred';

/**
 * Message in, enforcement decision out: cache, rules, split detection, then the AI
 * classifiers; violations go through the ledger and the escalation state machine
 * before the action reaches the transport.
 */
export class ModerationPipeline implements IModerationPipeline {
  private logger: ILogger;
  private errorHandler: ErrorHandler;
  private cache: ClassifierCache;
  private rules: RuleEngine;
  private splitDetector: SplitMessageDetector | undefined;
  private gateway: ClassifierGateway;
  private governor: QuotaGovernor;
  private ledger: ViolationLedger;
  private stateMachine: EnforcementStateMachine;
  private settings: ChatSettingsService;
  private dispatcher: ActionDispatcher;
  private transport: IModerationTransport;
  private store: IModerationStore;
  private stats: ModerationStats;
  private sudoUserId: string | undefined;
  /** Orders enforcement per (chat, user) by arrival, whatever order classification finishes in. */
  private arrivals = new KeyedMutex();

  constructor(deps: ModerationPipelineDependencies) {
    this.logger = deps.logger;
    this.errorHandler = deps.errorHandler;
    this.cache = deps.cache;
    this.rules = deps.rules;
    this.splitDetector = deps.splitDetector;
    this.gateway = deps.gateway;
    this.governor = deps.governor;
    this.ledger = deps.ledger;
    this.stateMachine = deps.stateMachine;
    this.settings = deps.settings;
    this.dispatcher = deps.dispatcher;
    this.transport = deps.transport;
    this.store = deps.store;
    this.stats = deps.stats ?? new ModerationStats();
    this.sudoUserId = deps.sudoUserId;
  }

  async processMessage(message: Message, options: ProcessOptions = {}): Promise<ModerationOutcome> {
    const startTime = Date.now();
    const priority = options.priority ?? 'live';

    const finish = (
      verdict: Verdict | null,
      action: EnforcementAction,
      record: ViolationRecord | null,
      deferred: boolean = false
    ): ModerationOutcome => {
      const outcome: ModerationOutcome = {
        messageId: message.messageId,
        chatId: message.chatId,
        userId: message.userId,
        verdict,
        action,
        record,
        deferred,
        durationMs: Date.now() - startTime
      };
      this.stats.record(outcome);
      return outcome;
    };

    const ticket = this.arrivals.reserve(recordKey(message.chatId, message.userId));
    try {
      if (this.isSudo(message)) {
        const exemption = this.stateMachine.exemption({ isSudo: true, isAdmin: false, severity: 'none' });
        return finish(null, exemption ?? NO_ACTION, null);
      }

      const classification = await this.classify(message, priority, options.signal);
      if (classification === 'deferred') {
        this.logger.debug('Message deferred', { messageId: message.messageId, chatId: message.chatId, priority });
        return finish(null, NO_ACTION, null, true);
      }

      const verdict = classification;
      if (verdict.severity === 'none') {
        return finish(verdict, NO_ACTION, null);
      }

      const { action, record } = await this.enforce(message, verdict, ticket);
      const dispatched = await this.dispatcher.execute(message, action);

      if (action.kind !== 'none' || action.deleteMessage) {
        this.logger.info('Moderation action taken', {
          category: 'moderation',
          action: action.kind,
          chatId: message.chatId,
          userId: message.userId,
          messageId: message.messageId,
          reason: action.reason,
          violation: verdict.category,
          severity: verdict.severity,
          source: verdict.source,
          exempt: action.exempt,
          delivered: dispatched.success
        });
        await this.audit(message, verdict, action);
      }

      this.logger.debug('Message processed', {
        messageId: message.messageId,
        durationMs: Date.now() - startTime
      });

      return finish(verdict, action, record);
    } catch (error) {
      this.errorHandler.handleError(
        error instanceof Error ? error : new Error(String(error)),
        ErrorCategory.UNKNOWN,
        ErrorSeverity.HIGH,
        {
          chatId: message.chatId,
          userId: message.userId,
          messageId: message.messageId,
          operation: 'process_message',
          component: 'moderation_pipeline'
        }
      );
      return finish(null, NO_ACTION, null);
    } finally {
      ticket.release();
    }
  }

  getStats(chatId: string): ModerationStatsSnapshot {
    const counters = this.stats.forChat(chatId);
    return {
      chatId,
      messagesProcessed: counters.messagesProcessed,
      deferred: counters.deferred,
      violationCounts: counters.violationCounts,
      actionCounts: counters.actionCounts,
      sourceCounts: counters.sourceCounts,
      averageProcessingMs: this.stats.averageProcessingMs(chatId),
      cacheHitRate: this.cache.getHitRate(),
      quotaUsage: this.governor.snapshot()
    };
  }

  private isSudo(message: Message): boolean {
    if (message.isSudo) {
      return true;
    }
    if (this.sudoUserId !== undefined && message.userId === this.sudoUserId) {
      return true;
    }
    try {
      return this.transport.isSudo(message.userId);
    } catch (error) {
      this.logger.warn('Transport sudo check failed', { userId: message.userId, error: String(error) });
      return false;
    }
  }

  private async classify(
    message: Message,
    priority: ProcessingPriority,
    signal: AbortSignal | undefined
  ): Promise<Classification> {
    const key = fingerprint(message.text);

    const cached = this.cache.lookup(key);
    if (cached && cached.severity !== 'none') {
      return cached;
    }

    const ruled = cached ?? this.rules.evaluate(message.text);
    if (ruled !== 'inconclusive' && ruled.severity !== 'none') {
      this.cache.store(key, ruled);
      return ruled;
    }

    // Clean messages still feed the split detector: the fragments look harmless one by one.
    const split = this.splitDetector?.observe(message);
    if (split) {
      return split;
    }

    if (ruled !== 'inconclusive') {
      if (!cached) {
        this.cache.store(key, ruled);
      }
      return ruled;
    }

    try {
      const verdict = await this.gateway.classify(message.text, { priority, signal });
      this.cache.store(key, verdict);
      return verdict;
    } catch (error) {
      if (!(error instanceof ClassificationUnavailable)) {
        throw error;
      }

      if (signal?.aborted) {
        return 'deferred';
      }
      if (priority === 'batch' && error.attempts.some(attempt => attempt.outcome === 'quota_denied')) {
        return 'deferred';
      }

      this.errorHandler.handleError(error, ErrorCategory.CLASSIFICATION, ErrorSeverity.MEDIUM, {
        chatId: message.chatId,
        messageId: message.messageId,
        operation: 'classify',
        component: 'moderation_pipeline'
      });
      return this.rules.conservativeVerdict(message.text);
    }
  }

  private async enforce(
    message: Message,
    verdict: Verdict,
    ticket: Ticket
  ): Promise<{ action: EnforcementAction; record: ViolationRecord | null }> {
    await ticket.turn;
    const isAdmin = message.role === 'admin' || (await this.checkAdmin(message));
    const exemption = this.stateMachine.exemption({ isSudo: false, isAdmin, severity: verdict.severity });
    if (exemption) {
      return { action: exemption, record: null };
    }

    const mode = await this.settings.getMode(message.chatId);
    let decided: EnforcementAction = NO_ACTION;

    const record = await this.ledger.recordViolation(message.chatId, message.userId, verdict.severity, current => {
      const result = this.stateMachine.transition(current.tier, mode, verdict.severity, current.tempBanCount);
      decided = result.action;
      return { tier: result.tier, tempBanIssued: result.tempBanIssued };
    });

    return { action: decided, record };
  }

  private async checkAdmin(message: Message): Promise<boolean> {
    try {
      return await this.transport.isAdmin(message.chatId, message.userId);
    } catch (error) {
      this.errorHandler.handleError(
        error instanceof Error ? error : new Error(String(error)),
        ErrorCategory.TRANSPORT,
        ErrorSeverity.LOW,
        { chatId: message.chatId, userId: message.userId, operation: 'is_admin', component: 'moderation_pipeline' }
      );
      return false;
    }
  }

  private async audit(message: Message, verdict: Verdict, action: EnforcementAction): Promise<void> {
    try {
      await this.store.logModerationAction({
        chatId: message.chatId,
        userId: message.userId,
        messageId: message.messageId,
        action: action.kind,
        durationMs: action.durationMs ?? null,
        reason: action.reason,
        category: verdict.category,
        severity: verdict.severity,
        source: verdict.source,
        exempt: action.exempt,
        createdAt: new Date()
      });
    } catch (error) {
      this.errorHandler.handlePersistenceError(
        error instanceof Error ? error : new Error(String(error)),
        'log_moderation_action',
        { chatId: message.chatId, userId: message.userId, messageId: message.messageId }
      );
    }
  }
}
