import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { ILogger } from '../core/interfaces/ILogger';
import { IModerationStore, ModerationActionEntry, PendingMessage } from '../core/interfaces/IModerationStore';
import {
  AuditActionKind,
  isEscalationTier,
  isSecurityMode,
  isSeverity,
  Message,
  SecurityMode,
  SenderRole,
  VerdictCategory,
  VerdictSource,
  ViolationRecord,
  isViolationCategory
} from '../moderation/types';
import { PersistenceUnavailable } from '../utils/errors';

interface ChatSettingsRow {
  security_mode: string;
}

interface ViolationRecordRow {
  chat_id: string;
  user_id: string;
  violation_count: number;
  last_violation_at: number | null;
  tier: string;
  temp_ban_count: number;
}

interface ModerationActionRow {
  chat_id: string;
  user_id: string;
  message_id: string;
  action: string;
  duration_ms: number | null;
  reason: string;
  category: string | null;
  severity: string;
  source: string | null;
  exempt: number;
  issued_by: string | null;
  created_at: number;
}

interface PendingMessageRow {
  cursor: number;
  message_id: string;
  chat_id: string;
  user_id: string;
  text: string;
  sent_at: number;
  role: string;
  is_sudo: number;
}

const ACTION_KINDS: readonly AuditActionKind[] = ['none', 'warn', 'delete', 'mute', 'temp-ban', 'perm-ban', 'unban'];
const VERDICT_SOURCES: readonly VerdictSource[] = ['rule', 'ai-primary', 'ai-fallback', 'cache'];
const SENDER_ROLES: readonly SenderRole[] = ['admin', 'regular', 'bot'];

function pick<T extends string>(allowed: readonly T[], value: string | null, fallback: T): T {
  return allowed.find(candidate => candidate === value) ?? fallback;
}

/**
 * SQLite-backed moderation store (better-sqlite3). Statements run synchronously; the
 * async surface matches the store interface so other backends can be swapped in.
 */
export class DatabaseManager implements IModerationStore {
  private db: Database.Database | null = null;
  private dbPath: string;
  private logger: ILogger;

  constructor(dbPath: string, logger: ILogger) {
    this.dbPath = dbPath === ':memory:' ? dbPath : path.resolve(dbPath);
    this.logger = logger;
  }

  async initialize(): Promise<void> {
    try {
      if (this.dbPath !== ':memory:') {
        const dbDir = path.dirname(this.dbPath);
        if (!fs.existsSync(dbDir)) {
          fs.mkdirSync(dbDir, { recursive: true });
        }
      }

      const db = new Database(this.dbPath);
      if (this.dbPath !== ':memory:') {
        db.pragma('journal_mode = WAL');
      }
      this.createTables(db);
      this.db = db;

      this.logger.info('Database initialized', { path: this.dbPath });
    } catch (error) {
      throw new PersistenceUnavailable('initialize', error);
    }
  }

  private createTables(db: Database.Database): void {
    // Handle both development and production paths
    const schemaPath = fs.existsSync(path.join(__dirname, '../../schemas/database.sql'))
      ? path.join(__dirname, '../../schemas/database.sql')
      : path.join(process.cwd(), 'bot/schemas/database.sql');

    if (!fs.existsSync(schemaPath)) {
      throw new Error(`Schema file not found at: ${schemaPath}`);
    }

    db.exec(fs.readFileSync(schemaPath, 'utf8'));
  }

  private getDb(operation: string): Database.Database {
    if (!this.db) {
      throw new PersistenceUnavailable(operation, 'Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  private run<T>(operation: string, work: (db: Database.Database) => T): T {
    const db = this.getDb(operation);
    try {
      return work(db);
    } catch (error) {
      throw new PersistenceUnavailable(operation, error);
    }
  }

  // Chat settings

  async getSecurityMode(chatId: string): Promise<SecurityMode | null> {
    return this.run('get_security_mode', db => {
      const row = db
        .prepare<[string], ChatSettingsRow>('SELECT security_mode FROM chat_settings WHERE chat_id = ?')
        .get(chatId);
      return row && isSecurityMode(row.security_mode) ? row.security_mode : null;
    });
  }

  async setSecurityMode(chatId: string, mode: SecurityMode, updatedBy: string): Promise<void> {
    this.run('set_security_mode', db => {
      db.prepare(`
        INSERT INTO chat_settings (chat_id, security_mode, updated_by, updated_at)
        VALUES (?, ?, ?, CURRENT_TIMESTAMP)
        ON CONFLICT(chat_id) DO UPDATE SET
          security_mode = excluded.security_mode,
          updated_by = excluded.updated_by,
          updated_at = CURRENT_TIMESTAMP
      `).run(chatId, mode, updatedBy);
    });
  }

  // Violation records

  async getViolationRecord(chatId: string, userId: string): Promise<ViolationRecord | null> {
    return this.run('get_violation_record', db => {
      const row = db
        .prepare<[string, string], ViolationRecordRow>(
          'SELECT * FROM violation_records WHERE chat_id = ? AND user_id = ?'
        )
        .get(chatId, userId);
      if (!row) {
        return null;
      }
      return {
        chatId: row.chat_id,
        userId: row.user_id,
        count: row.violation_count,
        lastViolationAt: row.last_violation_at === null ? null : new Date(row.last_violation_at),
        tier: isEscalationTier(row.tier) ? row.tier : 'none',
        tempBanCount: row.temp_ban_count
      };
    });
  }

  async saveViolationRecord(record: ViolationRecord): Promise<void> {
    this.run('save_violation_record', db => {
      db.prepare(`
        INSERT INTO violation_records
          (chat_id, user_id, violation_count, last_violation_at, tier, temp_ban_count, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, CURRENT_TIMESTAMP)
        ON CONFLICT(chat_id, user_id) DO UPDATE SET
          violation_count = excluded.violation_count,
          last_violation_at = excluded.last_violation_at,
          tier = excluded.tier,
          temp_ban_count = excluded.temp_ban_count,
          updated_at = CURRENT_TIMESTAMP
      `).run(
        record.chatId,
        record.userId,
        record.count,
        record.lastViolationAt ? record.lastViolationAt.getTime() : null,
        record.tier,
        record.tempBanCount
      );
    });
  }

  async deleteViolationRecord(chatId: string, userId: string): Promise<void> {
    this.run('delete_violation_record', db => {
      db.prepare('DELETE FROM violation_records WHERE chat_id = ? AND user_id = ?').run(chatId, userId);
    });
  }

  // Action audit

  async logModerationAction(entry: ModerationActionEntry): Promise<void> {
    this.run('log_moderation_action', db => {
      db.prepare(`
        INSERT INTO moderation_actions
          (chat_id, user_id, message_id, action, duration_ms, reason, category, severity, source, exempt, issued_by, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        entry.chatId,
        entry.userId,
        entry.messageId,
        entry.action,
        entry.durationMs,
        entry.reason,
        entry.category,
        entry.severity,
        entry.source,
        entry.exempt ? 1 : 0,
        entry.issuedBy ?? null,
        entry.createdAt.getTime()
      );
    });
  }

  async getRecentActions(chatId: string, limit: number): Promise<ModerationActionEntry[]> {
    return this.run('get_recent_actions', db => {
      const rows = db
        .prepare<[string, number], ModerationActionRow>(
          'SELECT * FROM moderation_actions WHERE chat_id = ? ORDER BY created_at DESC, id DESC LIMIT ?'
        )
        .all(chatId, limit);

      return rows.map(row => {
        const category: VerdictCategory | null =
          row.category === 'none' ? 'none' : isViolationCategory(row.category) ? row.category : null;
        return {
          chatId: row.chat_id,
          userId: row.user_id,
          messageId: row.message_id,
          action: pick(ACTION_KINDS, row.action, 'none'),
          durationMs: row.duration_ms,
          reason: row.reason,
          category,
          severity: isSeverity(row.severity) ? row.severity : 'none',
          source: row.source === null ? null : pick(VERDICT_SOURCES, row.source, 'rule'),
          exempt: row.exempt === 1,
          createdAt: new Date(row.created_at),
          issuedBy: row.issued_by ?? undefined
        };
      });
    });
  }

  // Sweep checkpoints

  async getSweepCheckpoint(name: string): Promise<number> {
    return this.run('get_sweep_checkpoint', db => {
      const row = db
        .prepare<[string], { cursor: number }>('SELECT cursor FROM sweep_checkpoints WHERE name = ?')
        .get(name);
      return row ? row.cursor : 0;
    });
  }

  async setSweepCheckpoint(name: string, cursor: number): Promise<void> {
    this.run('set_sweep_checkpoint', db => {
      db.prepare(`
        INSERT INTO sweep_checkpoints (name, cursor, updated_at)
        VALUES (?, ?, CURRENT_TIMESTAMP)
        ON CONFLICT(name) DO UPDATE SET cursor = excluded.cursor, updated_at = CURRENT_TIMESTAMP
      `).run(name, cursor);
    });
  }

  // Pending backlog

  async enqueuePendingMessage(message: Message): Promise<number> {
    return this.run('enqueue_pending_message', db => {
      const result = db.prepare(`
        INSERT INTO pending_messages (message_id, chat_id, user_id, text, sent_at, role, is_sudo)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(chat_id, message_id) DO NOTHING
      `).run(
        message.messageId,
        message.chatId,
        message.userId,
        message.text,
        message.timestamp.getTime(),
        message.role,
        message.isSudo ? 1 : 0
      );
      if (result.changes > 0) {
        return Number(result.lastInsertRowid);
      }

      const existing = db
        .prepare<[string, string], { cursor: number }>(
          'SELECT cursor FROM pending_messages WHERE chat_id = ? AND message_id = ?'
        )
        .get(message.chatId, message.messageId);
      return existing ? existing.cursor : 0;
    });
  }

  async fetchPendingMessages(afterCursor: number, limit: number): Promise<PendingMessage[]> {
    return this.run('fetch_pending_messages', db => {
      const rows = db
        .prepare<[number, number], PendingMessageRow>(
          'SELECT * FROM pending_messages WHERE cursor > ? ORDER BY cursor ASC LIMIT ?'
        )
        .all(afterCursor, limit);

      return rows.map(row => ({
        cursor: row.cursor,
        message: {
          messageId: row.message_id,
          chatId: row.chat_id,
          userId: row.user_id,
          text: row.text,
          timestamp: new Date(row.sent_at),
          role: pick(SENDER_ROLES, row.role, 'regular'),
          isSudo: row.is_sudo === 1
        }
      }));
    });
  }

  async prunePendingMessages(upToCursor: number): Promise<number> {
    return this.run('prune_pending_messages', db => {
      return db.prepare('DELETE FROM pending_messages WHERE cursor <= ?').run(upToCursor).changes;
    });
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
    this.logger.info('Database manager closed');
  }
}
