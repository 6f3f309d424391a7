import { ILogger } from '../core/interfaces/ILogger';
import { BanOptions, IModerationTransport } from '../core/interfaces/IModerationTransport';

export interface LoggingTransportOptions {
  sudoUserId?: string | undefined;
  /** chatId -> admin user ids */
  admins?: Record<string, string[]>;
}

/**
 * Dry-run transport used by the CLI: every action is written to the log instead of
 * reaching a chat platform.
 */
export class LoggingTransport implements IModerationTransport {
  private logger: ILogger;
  private sudoUserId: string | undefined;
  private admins: Map<string, Set<string>>;

  constructor(logger: ILogger, options: LoggingTransportOptions = {}) {
    this.logger = logger.child({ component: 'logging_transport' });
    this.sudoUserId = options.sudoUserId;
    this.admins = new Map(Object.entries(options.admins ?? {}).map(([chatId, ids]) => [chatId, new Set(ids)]));
  }

  async isAdmin(chatId: string, userId: string): Promise<boolean> {
    return this.admins.get(chatId)?.has(userId) ?? false;
  }

  isSudo(userId: string): boolean {
    return this.sudoUserId !== undefined && this.sudoUserId === userId;
  }

  async deleteMessage(chatId: string, messageId: string): Promise<void> {
    this.logger.info('Delete message', { chatId, messageId });
  }

  async mute(chatId: string, userId: string, durationMs: number): Promise<void> {
    this.logger.info('Mute user', { chatId, userId, durationMs });
  }

  async ban(chatId: string, userId: string, options: BanOptions): Promise<void> {
    if ('permanent' in options) {
      this.logger.info('Ban user permanently', { chatId, userId });
      return;
    }
    this.logger.info('Ban user', { chatId, userId, durationMs: options.durationMs });
  }

  async warn(chatId: string, userId: string, reason: string): Promise<void> {
    this.logger.info('Warn user', { chatId, userId, reason });
  }

  async unban(chatId: string, userId: string): Promise<void> {
    this.logger.info('Unban user', { chatId, userId });
  }

  async notifyAdmins(chatId: string, text: string): Promise<void> {
    const recipients = Array.from(this.admins.get(chatId) ?? []);
    if (this.sudoUserId !== undefined && !recipients.includes(this.sudoUserId)) {
      recipients.push(this.sudoUserId);
    }
    this.logger.info('Notify admins', { chatId, recipients, text });
  }
}
