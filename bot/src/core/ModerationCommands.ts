import { ChatSettingsService } from '../config/ChatSettingsService';
import { SplitMessageDetector } from '../moderation/filters/SplitMessageDetector';
import { ViolationLedger } from '../moderation/ledger/ViolationLedger';
import {
  AuditActionKind,
  isSecurityMode,
  SecurityMode,
  SECURITY_MODES,
  ViolationRecord
} from '../moderation/types';
import { ErrorCategory, ErrorHandler, ErrorSeverity } from '../utils/ErrorHandler';
import {
  InvalidArgument,
  InvalidModeValue,
  PermissionDenied,
  ProtectedUser,
  TransportFailure
} from '../utils/errors';
import { ILogger } from './interfaces/ILogger';
import { IModerationPipeline, ModerationStatsSnapshot } from './interfaces/IModerationPipeline';
import { IModerationStore } from './interfaces/IModerationStore';
import { BanOptions, IModerationTransport } from './interfaces/IModerationTransport';

/**
 * Who is running a command. Operator surfaces (CLI, HTTP API) issue commands as
 * `trusted`; chat-side issuers must be sudo or a chat admin.
 */
export interface CommandIssuer {
  userId: string;
  trusted?: boolean;
}

export interface ChatStatsReport extends ModerationStatsSnapshot {
  securityMode: SecurityMode;
}

export interface ManualBanOptions {
  reason?: string | undefined;
  /** Omit for a permanent ban. */
  durationMs?: number | undefined;
}

export interface ManualActionResult {
  chatId: string;
  userId: string;
  action: Extract<AuditActionKind, 'temp-ban' | 'perm-ban' | 'unban'>;
  record: ViolationRecord;
}

export interface ModerationCommandsDependencies {
  logger: ILogger;
  errorHandler: ErrorHandler;
  settings: ChatSettingsService;
  ledger: ViolationLedger;
  pipeline: IModerationPipeline;
  transport: IModerationTransport;
  store: IModerationStore;
  splitDetector?: SplitMessageDetector | undefined;
  sudoUserId?: string | undefined;
}

export class ModerationCommands {
  private logger: ILogger;
  private errorHandler: ErrorHandler;
  private settings: ChatSettingsService;
  private ledger: ViolationLedger;
  private pipeline: IModerationPipeline;
  private transport: IModerationTransport;
  private store: IModerationStore;
  private splitDetector: SplitMessageDetector | undefined;
  private sudoUserId: string | undefined;

  constructor(deps: ModerationCommandsDependencies) {
    this.logger = deps.logger;
    this.errorHandler = deps.errorHandler;
    this.settings = deps.settings;
    this.ledger = deps.ledger;
    this.pipeline = deps.pipeline;
    this.transport = deps.transport;
    this.store = deps.store;
    this.splitDetector = deps.splitDetector;
    this.sudoUserId = deps.sudoUserId;
  }

  /**
   * Change a chat's security mode. The value is checked before the issuer, so an invalid
   * mode is always reported as such; on any rejection the stored mode is untouched.
   */
  async setSecurityMode(chatId: string, mode: string, issuer: CommandIssuer): Promise<SecurityMode> {
    if (!isSecurityMode(mode)) {
      this.errorHandler.handleValidationError(`Rejected security mode "${mode}"`, 'mode', mode, {
        chatId,
        userId: issuer.userId,
        operation: 'set_security_mode',
        component: 'moderation_commands'
      });
      throw new InvalidModeValue(mode, SECURITY_MODES);
    }

    await this.authorize(chatId, issuer, 'change the security mode');
    return this.settings.setMode(chatId, mode, issuer.userId);
  }

  async getSecurityMode(chatId: string): Promise<SecurityMode> {
    return this.settings.getMode(chatId);
  }

  /**
   * Administrative reset: clears the user's record, including a permanent ban, and any
   * partial split-message history. A user the ledger has banned is unbanned on the
   * platform too; if that call fails the reset still stands and the failure is reported.
   */
  async resetUser(chatId: string, userId: string, issuer: CommandIssuer): Promise<ViolationRecord> {
    await this.authorize(chatId, issuer, 'reset violation records');

    const previous = await this.ledger.getRecord(chatId, userId);
    await this.ledger.reset(chatId, userId);
    this.splitDetector?.forget(chatId, userId);

    this.logger.info('Violation record reset', {
      category: 'moderation',
      chatId,
      userId,
      issuedBy: issuer.userId
    });

    if (previous.tier === 'temp-banned' || previous.tier === 'perm-banned') {
      try {
        await this.deliver('unban', chatId, userId, () => this.transport.unban(chatId, userId));
        await this.audit(chatId, userId, 'unban', null, 'reset_unban', issuer);
      } catch (error) {
        if (!(error instanceof TransportFailure)) {
          throw error;
        }
        this.logger.warn('Ban not lifted after reset', { category: 'moderation', chatId, userId, error: error.message });
      }
    }

    return this.ledger.getRecord(chatId, userId);
  }

  /**
   * Ban by command, permanently unless a duration is given. Administrators and the sudo
   * user cannot be banned. The ban counts as a violation in the ledger.
   */
  async banUser(
    chatId: string,
    userId: string,
    issuer: CommandIssuer,
    options: ManualBanOptions = {}
  ): Promise<ManualActionResult> {
    const { durationMs } = options;
    if (durationMs !== undefined && !(Number.isFinite(durationMs) && durationMs > 0)) {
      throw new InvalidArgument('Ban duration must be a positive number of milliseconds');
    }

    await this.authorize(chatId, issuer, 'ban users');
    await this.ensureRestrictable(chatId, userId);

    const permanent = durationMs === undefined;
    const ban: BanOptions = durationMs === undefined ? { permanent: true } : { durationMs };
    await this.deliver('ban', chatId, userId, () => this.transport.ban(chatId, userId, ban));

    const record = await this.ledger.recordViolation(chatId, userId, 'high', current =>
      permanent || current.tier === 'perm-banned'
        ? { tier: 'perm-banned', tempBanIssued: false }
        : { tier: 'temp-banned', tempBanIssued: true }
    );

    const action = permanent ? 'perm-ban' : 'temp-ban';
    const reason = options.reason?.trim() || 'no reason given';
    await this.audit(chatId, userId, action, durationMs ?? null, `manual_ban: ${reason}`, issuer);

    this.logger.info('User banned by command', {
      category: 'moderation',
      chatId,
      userId,
      action,
      durationMs,
      reason,
      issuedBy: issuer.userId
    });

    return { chatId, userId, action, record };
  }

  /**
   * Lift a ban by command and clear the user's record. Nothing changes locally if the
   * platform refuses the unban.
   */
  async unbanUser(chatId: string, userId: string, issuer: CommandIssuer): Promise<ManualActionResult> {
    await this.authorize(chatId, issuer, 'unban users');

    await this.deliver('unban', chatId, userId, () => this.transport.unban(chatId, userId));
    await this.ledger.reset(chatId, userId);
    this.splitDetector?.forget(chatId, userId);
    await this.audit(chatId, userId, 'unban', null, 'manual_unban', issuer);

    this.logger.info('User unbanned by command', { category: 'moderation', chatId, userId, issuedBy: issuer.userId });

    return { chatId, userId, action: 'unban', record: await this.ledger.getRecord(chatId, userId) };
  }

  async getStats(chatId: string): Promise<ChatStatsReport> {
    const securityMode = await this.settings.getMode(chatId);
    return { ...this.pipeline.getStats(chatId), securityMode };
  }

  private async ensureRestrictable(chatId: string, userId: string): Promise<void> {
    if ((this.sudoUserId !== undefined && userId === this.sudoUserId) || this.transport.isSudo(userId)) {
      throw new ProtectedUser(userId, 'banned');
    }

    let isAdmin: boolean;
    try {
      isAdmin = await this.transport.isAdmin(chatId, userId);
    } catch (error) {
      this.reportTransportError(error, chatId, userId, 'is_admin');
      throw new TransportFailure('is_admin', error);
    }
    if (isAdmin) {
      throw new ProtectedUser(userId, 'banned');
    }
  }

  private async deliver(operation: string, chatId: string, userId: string, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error) {
      this.reportTransportError(error, chatId, userId, operation);
      throw new TransportFailure(operation, error);
    }
  }

  private async audit(
    chatId: string,
    userId: string,
    action: AuditActionKind,
    durationMs: number | null,
    reason: string,
    issuer: CommandIssuer
  ): Promise<void> {
    try {
      await this.store.logModerationAction({
        chatId,
        userId,
        messageId: '',
        action,
        durationMs,
        reason,
        category: null,
        severity: 'none',
        source: null,
        exempt: false,
        createdAt: new Date(),
        issuedBy: issuer.userId
      });
    } catch (error) {
      this.errorHandler.handlePersistenceError(
        error instanceof Error ? error : new Error(String(error)),
        'log_moderation_action',
        { chatId, userId, component: 'moderation_commands' }
      );
    }
  }

  private reportTransportError(error: unknown, chatId: string, userId: string, operation: string): void {
    this.errorHandler.handleError(
      error instanceof Error ? error : new Error(String(error)),
      ErrorCategory.TRANSPORT,
      ErrorSeverity.MEDIUM,
      { chatId, userId, operation, component: 'moderation_commands' }
    );
  }

  private async authorize(chatId: string, issuer: CommandIssuer, action: string): Promise<void> {
    if (issuer.trusted) {
      return;
    }
    if (this.sudoUserId !== undefined && issuer.userId === this.sudoUserId) {
      return;
    }
    if (this.transport.isSudo(issuer.userId)) {
      return;
    }

    let isAdmin = false;
    try {
      isAdmin = await this.transport.isAdmin(chatId, issuer.userId);
    } catch (error) {
      this.errorHandler.handleError(
        error instanceof Error ? error : new Error(String(error)),
        ErrorCategory.TRANSPORT,
        ErrorSeverity.LOW,
        { chatId, userId: issuer.userId, operation: 'is_admin', component: 'moderation_commands' }
      );
    }

    if (!isAdmin) {
      this.logger.warn('Command rejected', { category: 'security', chatId, userId: issuer.userId, action });
      throw new PermissionDenied(action, issuer.userId);
    }
  }
}
