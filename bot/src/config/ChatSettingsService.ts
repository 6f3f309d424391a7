import { ILogger } from '../core/interfaces/ILogger';
import { IModerationStore } from '../core/interfaces/IModerationStore';
import { DEFAULT_SECURITY_MODE, isSecurityMode, SecurityMode, SECURITY_MODES } from '../moderation/types';
import { ErrorHandler } from '../utils/ErrorHandler';
import { InvalidModeValue, PersistenceUnavailable } from '../utils/errors';

export interface ModeChangeEvent {
  chatId: string;
  previous: SecurityMode;
  current: SecurityMode;
  changedBy: string;
  timestamp: Date;
}

export type ModeChangeCallback = (event: ModeChangeEvent) => void;

/**
 * Per-chat security mode. Reads are served from memory after the first store hit;
 * a chat with no stored mode uses the configured default.
 */
export class ChatSettingsService {
  private logger: ILogger;
  private errorHandler: ErrorHandler;
  private store: IModerationStore;
  private defaultMode: SecurityMode;
  private modes = new Map<string, SecurityMode>();
  private changeCallbacks: ModeChangeCallback[] = [];

  constructor(
    logger: ILogger,
    errorHandler: ErrorHandler,
    store: IModerationStore,
    defaultMode: SecurityMode = DEFAULT_SECURITY_MODE
  ) {
    this.logger = logger;
    this.errorHandler = errorHandler;
    this.store = store;
    this.defaultMode = defaultMode;
  }

  async getMode(chatId: string): Promise<SecurityMode> {
    const cached = this.modes.get(chatId);
    if (cached) {
      return cached;
    }

    try {
      const stored = await this.store.getSecurityMode(chatId);
      const mode = stored ?? this.defaultMode;
      this.modes.set(chatId, mode);
      return mode;
    } catch (error) {
      this.errorHandler.handlePersistenceError(
        error instanceof Error ? error : new Error(String(error)),
        'get_security_mode',
        { chatId }
      );
      return this.defaultMode;
    }
  }

  /**
   * Validate and persist a new mode. The in-memory mode changes only after the store
   * accepted it.
   */
  async setMode(chatId: string, value: string, changedBy: string): Promise<SecurityMode> {
    if (!isSecurityMode(value)) {
      throw new InvalidModeValue(value, SECURITY_MODES);
    }

    const previous = await this.getMode(chatId);

    try {
      await this.store.setSecurityMode(chatId, value, changedBy);
    } catch (error) {
      throw new PersistenceUnavailable('set_security_mode', error);
    }

    this.modes.set(chatId, value);
    this.logger.info('Security mode changed', { chatId, previous, current: value, changedBy });

    const event: ModeChangeEvent = { chatId, previous, current: value, changedBy, timestamp: new Date() };
    for (const callback of this.changeCallbacks) {
      try {
        callback(event);
      } catch (error) {
        this.logger.error('Error in mode change callback', { chatId, error: String(error) });
      }
    }

    return value;
  }

  onModeChange(callback: ModeChangeCallback): void {
    this.changeCallbacks.push(callback);
  }

  getDefaultMode(): SecurityMode {
    return this.defaultMode;
  }
}
