import {
  AuditActionKind,
  Message,
  SecurityMode,
  Severity,
  VerdictCategory,
  VerdictSource,
  ViolationRecord
} from '../../moderation/types';

export interface ModerationActionEntry {
  chatId: string;
  userId: string;
  messageId: string;
  action: AuditActionKind;
  durationMs: number | null;
  reason: string;
  category: VerdictCategory | null;
  severity: Severity;
  source: VerdictSource | null;
  exempt: boolean;
  createdAt: Date;
  /** Set for actions an operator or admin issued by command. */
  issuedBy?: string | undefined;
}

export interface PendingMessage {
  cursor: number;
  message: Message;
}

/**
 * Persistence used by the moderation core. Implementations may reject; callers treat
 * a rejection as the store being unavailable.
 */
export interface IModerationStore {
  getSecurityMode(chatId: string): Promise<SecurityMode | null>;
  setSecurityMode(chatId: string, mode: SecurityMode, updatedBy: string): Promise<void>;

  getViolationRecord(chatId: string, userId: string): Promise<ViolationRecord | null>;
  saveViolationRecord(record: ViolationRecord): Promise<void>;
  deleteViolationRecord(chatId: string, userId: string): Promise<void>;

  logModerationAction(entry: ModerationActionEntry): Promise<void>;
  getRecentActions(chatId: string, limit: number): Promise<ModerationActionEntry[]>;

  getSweepCheckpoint(name: string): Promise<number>;
  setSweepCheckpoint(name: string, cursor: number): Promise<void>;

  enqueuePendingMessage(message: Message): Promise<number>;
  fetchPendingMessages(afterCursor: number, limit: number): Promise<PendingMessage[]>;
  prunePendingMessages(upToCursor: number): Promise<number>;
}
