/**
 * Per-user violation records: serialization, decay, reset and store outages
 */

import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { ViolationLedger } from '../../bot/src/moderation/ledger/ViolationLedger';
import { ErrorCategory, ErrorHandler } from '../../bot/src/utils/ErrorHandler';
import { createTestLogger, InMemoryStore } from '../setup';

const WEEK = 7 * 24 * 60 * 60 * 1000;

describe('ViolationLedger', () => {
  let store: InMemoryStore;
  let errorHandler: ErrorHandler;
  let clock: number;
  let ledger: ViolationLedger;

  beforeEach(() => {
    const logger = createTestLogger();
    store = new InMemoryStore();
    errorHandler = new ErrorHandler(logger);
    clock = Date.UTC(2024, 4, 1);
    ledger = new ViolationLedger(logger, errorHandler, store, { inactivityResetMs: WEEK }, () => clock);
  });

  afterEach(() => {
    ledger.stop();
    errorHandler.destroy();
  });

  describe('Recording violations', () => {
    test('should create and persist a record on the first violation', async () => {
      const record = await ledger.recordViolation('1001', '55', 'high');

      expect(record).toEqual({
        chatId: '1001',
        userId: '55',
        count: 1,
        lastViolationAt: new Date(clock),
        tier: 'warned',
        tempBanCount: 0
      });
      expect(store.records.get('1001:55')).toEqual(record);
    });

    test('should continue from a stored record', async () => {
      store.records.set('1001:55', {
        chatId: '1001',
        userId: '55',
        count: 2,
        lastViolationAt: new Date(clock - 1000),
        tier: 'muted',
        tempBanCount: 0
      });

      const record = await ledger.recordViolation('1001', '55', 'medium');
      expect(record).toMatchObject({ count: 3, tier: 'temp-banned', tempBanCount: 1 });
    });

    test('should apply every one of 100 concurrent violations', async () => {
      await Promise.all(Array.from({ length: 100 }, () => ledger.recordViolation('1001', '55', 'high')));

      const record = await ledger.getRecord('1001', '55');
      expect(record.count).toBe(100);
      expect(record.tier).toBe('perm-banned');
      expect(record.tempBanCount).toBe(1);
      expect(store.records.get('1001:55')?.count).toBe(100);
    });

    test('should keep different users independent', async () => {
      await Promise.all([
        ledger.recordViolation('1001', 'a', 'high'),
        ledger.recordViolation('1001', 'b', 'high'),
        ledger.recordViolation('2002', 'a', 'high')
      ]);

      expect(store.records.size).toBe(3);
      expect((await ledger.getRecord('1001', 'a')).count).toBe(1);
    });

    test('should pass the decided tier through a custom resolver', async () => {
      const record = await ledger.recordViolation('1001', '55', 'low', () => ({
        tier: 'temp-banned',
        tempBanIssued: true
      }));

      expect(record).toMatchObject({ tier: 'temp-banned', tempBanCount: 1 });
    });
  });

  describe('Inactivity decay', () => {
    test('should clear the tier after a quiet period', async () => {
      await ledger.recordViolation('1001', '55', 'high');
      await ledger.recordViolation('1001', '55', 'high');

      clock += WEEK + 1;
      const record = await ledger.getRecord('1001', '55');
      expect(record).toMatchObject({ count: 0, tier: 'none' });

      const next = await ledger.recordViolation('1001', '55', 'high');
      expect(next).toMatchObject({ count: 1, tier: 'warned' });
    });

    test('should never lift a permanent ban', async () => {
      await ledger.recordViolation('1001', '55', 'critical');

      clock += 10 * WEEK;
      expect(await ledger.currentTier('1001', '55')).toBe('perm-banned');
    });
  });

  describe('Reset', () => {
    test('should clear every tier including a permanent ban', async () => {
      await ledger.recordViolation('1001', '55', 'critical');
      await ledger.reset('1001', '55');

      expect(await ledger.getRecord('1001', '55')).toEqual({
        chatId: '1001',
        userId: '55',
        count: 0,
        lastViolationAt: null,
        tier: 'none',
        tempBanCount: 0
      });
      expect(store.records.has('1001:55')).toBe(false);
    });

    test('should retry a failed delete on the next flush', async () => {
      await ledger.recordViolation('1001', '55', 'high');
      store.failing.add('deleteViolationRecord');
      await ledger.reset('1001', '55');
      expect(ledger.pendingCount()).toBe(1);

      store.failing.delete('deleteViolationRecord');
      expect(await ledger.flushPending()).toBe(1);
      expect(store.records.has('1001:55')).toBe(false);
    });
  });

  describe('Store outages', () => {
    test('should keep escalating in memory and write once the store is back', async () => {
      store.failing.add('saveViolationRecord');

      const first = await ledger.recordViolation('1001', '55', 'high');
      const second = await ledger.recordViolation('1001', '55', 'high');

      expect(first.tier).toBe('warned');
      expect(second.tier).toBe('muted');
      expect(store.records.size).toBe(0);
      expect(ledger.pendingCount()).toBe(1);
      expect(errorHandler.getErrors({ category: ErrorCategory.PERSISTENCE }).length).toBeGreaterThan(0);

      store.failing.delete('saveViolationRecord');
      expect(await ledger.flushPending()).toBe(1);
      expect(store.records.get('1001:55')).toMatchObject({ count: 2, tier: 'muted' });
      expect(ledger.pendingCount()).toBe(0);
    });

    test('should start from a fresh record when the store cannot be read', async () => {
      store.failing.add('getViolationRecord');

      const record = await ledger.recordViolation('1001', '55', 'high');
      expect(record).toMatchObject({ count: 1, tier: 'warned' });
      expect(errorHandler.getErrors({ category: ErrorCategory.PERSISTENCE })[0].context.operation).toBe(
        'get_violation_record'
      );
    });

    test('should not overwrite a stored ban it could not read', async () => {
      store.records.set('1001:55', {
        chatId: '1001',
        userId: '55',
        count: 9,
        lastViolationAt: new Date(clock - 1000),
        tier: 'perm-banned',
        tempBanCount: 2
      });
      store.failing.add('getViolationRecord');

      const record = await ledger.recordViolation('1001', '55', 'medium');

      expect(record).toMatchObject({ count: 1, tier: 'warned' });
      expect(store.records.get('1001:55')).toMatchObject({ count: 9, tier: 'perm-banned' });
      expect(store.saveCalls).toBe(0);
      expect(ledger.pendingCount()).toBe(1);
    });

    test('should merge local violations into the stored record once it can be read', async () => {
      store.records.set('1001:55', {
        chatId: '1001',
        userId: '55',
        count: 9,
        lastViolationAt: new Date(clock - 1000),
        tier: 'perm-banned',
        tempBanCount: 2
      });
      store.failing.add('getViolationRecord');
      await ledger.recordViolation('1001', '55', 'medium');
      await ledger.recordViolation('1001', '55', 'medium');

      store.failing.delete('getViolationRecord');
      expect(await ledger.flushPending()).toBe(1);

      expect(store.records.get('1001:55')).toEqual({
        chatId: '1001',
        userId: '55',
        count: 11,
        lastViolationAt: new Date(clock),
        tier: 'perm-banned',
        tempBanCount: 2
      });
      expect(ledger.pendingCount()).toBe(0);

      const next = await ledger.recordViolation('1001', '55', 'medium');
      expect(next).toMatchObject({ count: 12, tier: 'perm-banned' });
    });

    test('should reconcile before applying the next violation', async () => {
      store.records.set('1001:55', {
        chatId: '1001',
        userId: '55',
        count: 1,
        lastViolationAt: new Date(clock - 1000),
        tier: 'warned',
        tempBanCount: 0
      });
      store.failing.add('getViolationRecord');
      await ledger.recordViolation('1001', '55', 'medium');
      store.failing.delete('getViolationRecord');

      const record = await ledger.recordViolation('1001', '55', 'medium');

      expect(record).toMatchObject({ count: 3, tier: 'muted', tempBanCount: 0 });
      expect(store.records.get('1001:55')).toMatchObject({ count: 3, tier: 'muted' });
      expect(ledger.pendingCount()).toBe(0);
    });
  });

  describe('Memory', () => {
    test('should keep only the configured number of persisted records', async () => {
      const small = new ViolationLedger(createTestLogger(), errorHandler, store, { cacheSize: 2 }, () => clock);

      for (const userId of ['a', 'b', 'c', 'd', 'e']) {
        await small.recordViolation('1001', userId, 'high');
      }

      expect(small.residentCount()).toBe(2);
      expect(store.records.size).toBe(5);
      expect((await small.getRecord('1001', 'a')).count).toBe(1);
    });

    test('should pin records the store has not accepted', async () => {
      const small = new ViolationLedger(createTestLogger(), errorHandler, store, { cacheSize: 1 }, () => clock);
      store.failing.add('saveViolationRecord');

      for (const userId of ['a', 'b', 'c']) {
        await small.recordViolation('1001', userId, 'high');
      }

      expect(small.pendingCount()).toBe(3);
      expect(small.residentCount()).toBe(3);

      store.failing.delete('saveViolationRecord');
      expect(await small.flushPending()).toBe(3);
      expect(small.residentCount()).toBe(1);
    });
  });
});
