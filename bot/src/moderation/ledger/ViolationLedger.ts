import { ILogger } from '../../core/interfaces/ILogger';
import { IModerationStore } from '../../core/interfaces/IModerationStore';
import { ErrorHandler } from '../../utils/ErrorHandler';
import { KeyedMutex } from '../../utils/KeyedMutex';
import { CacheManager } from '../../performance/CacheManager';
import { EscalationTier, ESCALATION_TIERS, recordKey, Severity, ViolationRecord } from '../types';

export interface TierResolution {
  tier: EscalationTier;
  tempBanIssued: boolean;
}

/** Decides the tier after a violation, given the (already decayed) record. */
export type TierResolver = (record: Readonly<ViolationRecord>, severity: Severity) => TierResolution;

export interface ViolationLedgerConfig {
  inactivityResetMs: number;
  reconcileIntervalMs: number;
  /** Persisted records kept in memory; records waiting on the store are not counted. */
  cacheSize: number;
  cacheTtlMs: number;
}

export const DEFAULT_LEDGER_CONFIG: ViolationLedgerConfig = {
  inactivityResetMs: 7 * 24 * 60 * 60 * 1000,
  reconcileIntervalMs: 30 * 1000,
  cacheSize: 10000,
  cacheTtlMs: 60 * 60 * 1000
};

export const defaultTierResolver: TierResolver = (record, severity) => {
  if (severity === 'critical') {
    return { tier: 'perm-banned', tempBanIssued: false };
  }
  const index = ESCALATION_TIERS.indexOf(record.tier);
  const tier = ESCALATION_TIERS[Math.min(index + 1, ESCALATION_TIERS.length - 1)];
  return { tier, tempBanIssued: tier === 'temp-banned' && record.tier !== 'temp-banned' };
};

function freshRecord(chatId: string, userId: string): ViolationRecord {
  return { chatId, userId, count: 0, lastViolationAt: null, tier: 'none', tempBanCount: 0 };
}

/**
 * Combine the stored record with violations applied while the store could not be read:
 * counts add up and the higher tier wins, so a stored permanent ban survives.
 */
export function mergeRecords(stored: ViolationRecord, local: ViolationRecord): ViolationRecord {
  const storedAt = stored.lastViolationAt?.getTime() ?? -Infinity;
  const localAt = local.lastViolationAt?.getTime() ?? -Infinity;
  return {
    chatId: stored.chatId,
    userId: stored.userId,
    count: stored.count + local.count,
    lastViolationAt: storedAt >= localAt ? stored.lastViolationAt : local.lastViolationAt,
    tier: ESCALATION_TIERS.indexOf(stored.tier) >= ESCALATION_TIERS.indexOf(local.tier) ? stored.tier : local.tier,
    tempBanCount: stored.tempBanCount + local.tempBanCount
  };
}

function copyRecord(record: ViolationRecord): ViolationRecord {
  return {
    ...record,
    lastViolationAt: record.lastViolationAt ? new Date(record.lastViolationAt.getTime()) : null
  };
}

interface PendingEntry {
  record: ViolationRecord;
  /** False while the stored record is unknown; the entry then holds only local changes. */
  verified: boolean;
}

function isBlank(record: ViolationRecord): boolean {
  return record.count === 0 && record.tier === 'none' && record.lastViolationAt === null;
}

/**
 * Per-(chat, user) violation history. Mutations for one key are serialized; different
 * keys proceed independently. Persisted records sit in a bounded LRU; records the store
 * has not accepted yet are pinned until a retry succeeds.
 */
export class ViolationLedger {
  private logger: ILogger;
  private errorHandler: ErrorHandler;
  private store: IModerationStore;
  private config: ViolationLedgerConfig;
  private mutex = new KeyedMutex();
  private cache: CacheManager<ViolationRecord>;
  private pending = new Map<string, PendingEntry>();
  private reconcileTimer: NodeJS.Timeout | null = null;
  private readonly now: () => number;

  constructor(
    logger: ILogger,
    errorHandler: ErrorHandler,
    store: IModerationStore,
    config: Partial<ViolationLedgerConfig> = {},
    now: () => number = Date.now
  ) {
    this.logger = logger;
    this.errorHandler = errorHandler;
    this.store = store;
    this.config = { ...DEFAULT_LEDGER_CONFIG, ...config };
    this.now = now;
    this.cache = new CacheManager<ViolationRecord>(
      logger,
      { maxSize: this.config.cacheSize, defaultTtl: this.config.cacheTtlMs, cleanupInterval: 0 },
      now
    );
  }

  start(): void {
    if (this.reconcileTimer) {
      return;
    }
    this.reconcileTimer = setInterval(() => {
      this.cache.cleanup();
      this.flushPending().catch((error: unknown) => {
        this.logger.warn('Violation ledger reconciliation failed', { error: String(error) });
      });
    }, this.config.reconcileIntervalMs);
    this.reconcileTimer.unref();
  }

  stop(): void {
    if (this.reconcileTimer) {
      clearInterval(this.reconcileTimer);
      this.reconcileTimer = null;
    }
  }

  async recordViolation(
    chatId: string,
    userId: string,
    severity: Severity,
    resolveTier: TierResolver = defaultTierResolver
  ): Promise<ViolationRecord> {
    const key = recordKey(chatId, userId);

    return this.mutex.runExclusive(key, async () => {
      const { record, verified } = await this.resolve(key, chatId, userId, true);
      const current = this.applyDecay(record);
      const resolution = resolveTier(copyRecord(current), severity);

      const updated: ViolationRecord = {
        chatId,
        userId,
        count: current.count + 1,
        lastViolationAt: new Date(this.now()),
        tier: resolution.tier,
        tempBanCount: current.tempBanCount + (resolution.tempBanIssued ? 1 : 0)
      };

      if (verified) {
        await this.persist(key, updated);
      } else {
        // Writing now could overwrite a record we never saw.
        this.pending.set(key, { record: updated, verified: false });
        this.logger.warn('Violation record held in memory until the store can be read', { chatId, userId });
      }
      return copyRecord(updated);
    });
  }

  async currentTier(chatId: string, userId: string): Promise<EscalationTier> {
    const record = await this.getRecord(chatId, userId);
    return record.tier;
  }

  /**
   * The record as escalation would see it now, with inactivity decay applied.
   */
  async getRecord(chatId: string, userId: string): Promise<ViolationRecord> {
    const key = recordKey(chatId, userId);
    return this.mutex.runExclusive(key, async () => {
      const { record } = await this.resolve(key, chatId, userId, true);
      return copyRecord(this.applyDecay(record));
    });
  }

  /**
   * Administrative reset. Clears every tier, including a permanent ban.
   */
  async reset(chatId: string, userId: string): Promise<void> {
    const key = recordKey(chatId, userId);

    await this.mutex.runExclusive(key, async () => {
      const cleared = freshRecord(chatId, userId);
      try {
        await this.store.deleteViolationRecord(chatId, userId);
        this.pending.delete(key);
        this.cache.set(key, cleared);
      } catch (error) {
        this.cache.delete(key);
        this.pending.set(key, { record: cleared, verified: true });
        this.reportStoreFailure(error, 'delete_violation_record', chatId, userId);
      }
    });

    this.logger.info('Violation record reset', { chatId, userId });
  }

  async flushPending(): Promise<number> {
    let flushed = 0;
    for (const key of Array.from(this.pending.keys())) {
      const written = await this.mutex.runExclusive(key, () => this.retryPending(key));
      if (written) {
        flushed++;
      }
    }
    return flushed;
  }

  pendingCount(): number {
    return this.pending.size;
  }

  /** Records currently held in memory, pinned ones included. */
  residentCount(): number {
    return this.cache.size() + this.pending.size;
  }

  /**
   * Current state for a key. Caller must hold the key's lock. A read failure returns
   * the local changes (or a fresh record) marked unverified.
   */
  private async resolve(key: string, chatId: string, userId: string, report: boolean): Promise<PendingEntry> {
    const pending = this.pending.get(key);
    if (pending?.verified) {
      return pending;
    }
    if (!pending) {
      const cached = this.cache.get(key);
      if (cached) {
        return { record: cached, verified: true };
      }
    }

    let stored: ViolationRecord | null;
    try {
      stored = await this.store.getViolationRecord(chatId, userId);
    } catch (error) {
      if (report) {
        this.reportStoreFailure(error, 'get_violation_record', chatId, userId);
      } else {
        this.logger.debug('Violation record still unreadable', { key, error: String(error) });
      }
      return pending ?? { record: freshRecord(chatId, userId), verified: false };
    }

    const base = stored ?? freshRecord(chatId, userId);
    if (!pending) {
      this.cache.set(key, base);
      return { record: base, verified: true };
    }

    const merged: PendingEntry = { record: mergeRecords(this.applyDecay(base), pending.record), verified: true };
    this.pending.set(key, merged);
    this.logger.info('Violation record reconciled with the store', {
      chatId,
      userId,
      tier: merged.record.tier,
      count: merged.record.count
    });
    return merged;
  }

  private applyDecay(record: ViolationRecord): ViolationRecord {
    if (record.tier === 'perm-banned' || !record.lastViolationAt) {
      return record;
    }

    if (this.now() - record.lastViolationAt.getTime() <= this.config.inactivityResetMs) {
      return record;
    }

    return { ...record, count: 0, tier: 'none' };
  }

  private async persist(key: string, record: ViolationRecord): Promise<void> {
    try {
      await this.store.saveViolationRecord(copyRecord(record));
      this.pending.delete(key);
      this.cache.set(key, record);
    } catch (error) {
      this.cache.delete(key);
      this.pending.set(key, { record, verified: true });
      this.reportStoreFailure(error, 'save_violation_record', record.chatId, record.userId);
    }
  }

  /**
   * Reconcile and write a pinned key. Caller must hold the key's lock.
   */
  private async retryPending(key: string): Promise<boolean> {
    const entry = this.pending.get(key);
    if (!entry) {
      return false;
    }

    const resolved = await this.resolve(key, entry.record.chatId, entry.record.userId, false);
    if (!resolved.verified) {
      return false;
    }

    const record = resolved.record;
    try {
      if (isBlank(record)) {
        await this.store.deleteViolationRecord(record.chatId, record.userId);
      } else {
        await this.store.saveViolationRecord(copyRecord(record));
      }
      this.pending.delete(key);
      this.cache.set(key, record);
      return true;
    } catch (error) {
      this.logger.debug('Violation record still not persisted', { key, error: String(error) });
      return false;
    }
  }

  private reportStoreFailure(error: unknown, operation: string, chatId: string, userId: string): void {
    this.errorHandler.handlePersistenceError(
      error instanceof Error ? error : new Error(String(error)),
      operation,
      { chatId, userId, component: 'violation_ledger' }
    );
  }
}
