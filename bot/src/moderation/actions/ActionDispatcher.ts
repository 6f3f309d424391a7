import { ILogger } from '../../core/interfaces/ILogger';
import { IModerationTransport } from '../../core/interfaces/IModerationTransport';
import { ErrorCategory, ErrorHandler, ErrorSeverity } from '../../utils/ErrorHandler';
import { EnforcementAction, EnforcementActionKind, Message } from '../types';

export interface ActionResult {
  success: boolean;
  action: EnforcementAction['kind'];
  messageDeleted: boolean;
  error?: string;
}

const RESTRICTIONS: Partial<Record<EnforcementActionKind, string>> = {
  mute: 'muted',
  'temp-ban': 'temporarily banned',
  'perm-ban': 'permanently banned'
};

export function formatDuration(ms: number): string {
  const minutes = Math.round(ms / 60000);
  if (minutes < 60 || minutes % 60 !== 0) {
    return `${minutes}m`;
  }
  const hours = minutes / 60;
  return hours % 24 === 0 ? `${hours / 24}d` : `${hours}h`;
}

/** Admin notification text for a restriction, or null for actions admins are not told about. */
export function describeRestriction(userId: string, action: EnforcementAction): string | null {
  const verb = RESTRICTIONS[action.kind];
  if (!verb) {
    return null;
  }
  const duration = action.durationMs ? ` for ${formatDuration(action.durationMs)}` : '';
  return `User ${userId} was ${verb}${duration}. Reason: ${action.reason}`;
}

/**
 * Carries an enforcement decision out through the chat transport. Transport failures
 * are logged and reported in the result; they never propagate.
 */
export class ActionDispatcher {
  private logger: ILogger;
  private errorHandler: ErrorHandler;
  private transport: IModerationTransport;

  constructor(logger: ILogger, errorHandler: ErrorHandler, transport: IModerationTransport) {
    this.logger = logger;
    this.errorHandler = errorHandler;
    this.transport = transport;
  }

  async execute(message: Message, action: EnforcementAction): Promise<ActionResult> {
    if (action.kind === 'none' && !action.deleteMessage) {
      return { success: true, action: action.kind, messageDeleted: false };
    }

    const errors: string[] = [];
    let messageDeleted = false;

    if (action.deleteMessage || action.kind === 'delete') {
      messageDeleted = await this.run('delete_message', message, errors, () =>
        this.transport.deleteMessage(message.chatId, message.messageId)
      );
    }

    const { chatId, userId } = message;
    let restricted = false;
    switch (action.kind) {
      case 'warn':
        await this.run('warn', message, errors, () => this.transport.warn(chatId, userId, action.reason));
        break;
      case 'mute':
        restricted = await this.run('mute', message, errors, () =>
          this.transport.mute(chatId, userId, action.durationMs ?? 0)
        );
        break;
      case 'temp-ban':
        restricted = await this.run('temp_ban', message, errors, () =>
          this.transport.ban(chatId, userId, { durationMs: action.durationMs ?? 0 })
        );
        break;
      case 'perm-ban':
        restricted = await this.run('perm_ban', message, errors, () =>
          this.transport.ban(chatId, userId, { permanent: true })
        );
        break;
      case 'delete':
      case 'none':
        break;
    }

    const notice = restricted ? describeRestriction(userId, action) : null;
    if (notice) {
      // Best effort: a failed notice does not make the action itself fail.
      await this.run('notify_admins', message, [], () => this.transport.notifyAdmins(chatId, notice));
    }

    if (errors.length > 0) {
      return { success: false, action: action.kind, messageDeleted, error: errors.join('; ') };
    }

    return { success: true, action: action.kind, messageDeleted };
  }

  private async run(
    operation: string,
    message: Message,
    errors: string[],
    call: () => Promise<void>
  ): Promise<boolean> {
    try {
      await call();
      return true;
    } catch (error) {
      errors.push(`${operation}: ${String(error)}`);
      this.errorHandler.handleError(
        error instanceof Error ? error : new Error(String(error)),
        ErrorCategory.TRANSPORT,
        ErrorSeverity.MEDIUM,
        {
          chatId: message.chatId,
          userId: message.userId,
          messageId: message.messageId,
          operation,
          component: 'action_dispatcher'
        }
      );
      this.logger.debug('Transport call failed', { operation, messageId: message.messageId });
      return false;
    }
  }
}
