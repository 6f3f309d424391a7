/**
 * Integration Tests for the moderation pipeline
 * Real rules, cache, ledger and state machine; scripted AI providers and transport
 */

import { describe, test, expect, afterEach } from '@jest/globals';
import { ErrorCategory } from '../../bot/src/utils/ErrorHandler';
import { createMockMessage, createPipelineHarness, PipelineHarness, ProviderStep, resultStep } from '../setup';

describe('Moderation pipeline integration', () => {
  let harness: PipelineHarness;

  const broken: ProviderStep = { kind: 'error', error: new Error('upstream 500') };

  afterEach(() => {
    harness.dispose();
  });

  describe('Classification', () => {
    test('should serve a repeated message from the cache', async () => {
      harness = createPipelineHarness({
        primarySteps: [resultStep({ category: 'scam_fraud', severity: 'medium', confidence: 0.85, reason: 'fake prize' })]
      });

      const first = await harness.pipeline.processMessage(createMockMessage({ text: 'meet me later tonight' }));
      const second = await harness.pipeline.processMessage(
        createMockMessage({ messageId: 'msg-2', userId: '77', text: 'Meet me  later tonight' })
      );

      expect(first.verdict).toMatchObject({ category: 'scam_fraud', source: 'ai-primary' });
      expect(second.verdict).toMatchObject({ category: 'scam_fraud', source: 'cache', origin: 'ai-primary' });
      expect(harness.primary.calls).toEqual(['meet me later tonight']);
    });

    test('should decide rule matches without calling the providers', async () => {
      harness = createPipelineHarness();

      const outcome = await harness.pipeline.processMessage(createMockMessage({ text: 'buy drugs here' }));

      expect(outcome.verdict).toMatchObject({ category: 'illegal_substances', severity: 'high', source: 'rule' });
      expect(harness.primary.calls).toHaveLength(0);
    });

    test('should take no action on clean messages', async () => {
      harness = createPipelineHarness();

      const outcome = await harness.pipeline.processMessage(createMockMessage());

      expect(outcome.action.kind).toBe('none');
      expect(outcome.record).toBeNull();
      expect(harness.transport.calls).toHaveLength(0);
      expect(harness.store.actions).toHaveLength(0);
    });

    test('should fall back to the conservative verdict when every provider fails', async () => {
      harness = createPipelineHarness({ primarySteps: [broken], fallbackSteps: [broken] });

      const suspicious = await harness.pipeline.processMessage(createMockMessage({ text: 'anyone got pills' }));
      const harmless = await harness.pipeline.processMessage(
        createMockMessage({ messageId: 'msg-2', text: 'see you tomorrow' })
      );

      expect(suspicious.verdict).toMatchObject({
        category: 'illegal_substances',
        severity: 'low',
        needsReview: true,
        source: 'rule'
      });
      expect(suspicious.action).toMatchObject({ kind: 'warn', deleteMessage: false });
      expect(harmless.action.kind).toBe('none');
      expect(harness.transport.operations()).toEqual(['warn']);
      expect(harness.errorHandler.getErrors({ category: ErrorCategory.CLASSIFICATION }).length).toBeGreaterThan(0);
    });

    test('should defer batch work when the quota is reserved for live traffic', async () => {
      harness = createPipelineHarness({ quota: { limit: 1, liveReserve: 1 } });

      const outcome = await harness.pipeline.processMessage(createMockMessage({ text: 'meet me later tonight' }), {
        priority: 'batch'
      });

      expect(outcome.deferred).toBe(true);
      expect(outcome.action.kind).toBe('none');
      expect(harness.primary.calls).toHaveLength(0);
      expect(harness.pipeline.getStats('1001')).toMatchObject({ messagesProcessed: 0, deferred: 1 });
    });
  });

  describe('Enforcement', () => {
    test('should warn and then mute a repeat offender', async () => {
      harness = createPipelineHarness();

      const first = await harness.pipeline.processMessage(createMockMessage({ text: 'buy drugs here' }));
      const second = await harness.pipeline.processMessage(
        createMockMessage({ messageId: 'msg-2', text: 'buy drugs here' })
      );

      expect(first.action).toMatchObject({ kind: 'warn', reason: 'first_violation_warning' });
      expect(second.action).toMatchObject({ kind: 'mute', durationMs: 3600000 });
      expect(second.record).toMatchObject({ count: 2, tier: 'muted' });
      expect(harness.transport.operations()).toEqual(['delete', 'warn', 'delete', 'mute']);
      expect(harness.store.actions.map(entry => entry.action)).toEqual(['warn', 'mute']);
    });

    test('should escalate in arrival order when admin lookups finish out of order', async () => {
      harness = createPipelineHarness();
      harness.transport.adminDelaysMs.push(30, 0);

      const [first, second] = await Promise.all([
        harness.pipeline.processMessage(createMockMessage({ text: 'buy drugs here' })),
        harness.pipeline.processMessage(createMockMessage({ messageId: 'msg-2', text: 'selling weed now' }))
      ]);

      expect(first.action.kind).toBe('warn');
      expect(second.action.kind).toBe('mute');
      expect(harness.transport.operations()).toEqual(['delete', 'warn', 'delete', 'mute']);
    });

    test('should permanently ban on a critical violation', async () => {
      harness = createPipelineHarness();

      const outcome = await harness.pipeline.processMessage(createMockMessage({ text: 'selling loli pics' }));

      expect(outcome.verdict).toMatchObject({ category: 'child_exploitation', severity: 'critical' });
      expect(outcome.action).toMatchObject({ kind: 'perm-ban', reason: 'critical_violation' });
      expect(harness.transport.calls[1]).toEqual({
        operation: 'ban',
        chatId: '1001',
        target: '55',
        detail: { permanent: true }
      });
    });

    test('should ban on the first violation in extreme mode', async () => {
      harness = createPipelineHarness();
      await harness.settings.setMode('1001', 'extreme', 'owner');

      const outcome = await harness.pipeline.processMessage(createMockMessage({ text: 'buy drugs here' }));

      expect(outcome.action).toMatchObject({ kind: 'perm-ban', reason: 'extreme_mode_zero_tolerance' });
      expect(harness.transport.operations()).toEqual(['delete', 'ban']);
    });

    test('should never restrict the sudo user', async () => {
      harness = createPipelineHarness({ sudoUserId: 'owner' });

      const outcome = await harness.pipeline.processMessage(
        createMockMessage({ userId: 'owner', text: 'selling loli pics' })
      );

      expect(outcome.action).toMatchObject({ kind: 'none', reason: 'sudo_exempt', exempt: true });
      expect(harness.transport.calls).toHaveLength(0);
      expect(harness.store.records.size).toBe(0);
    });

    test('should only delete critical content from admins', async () => {
      harness = createPipelineHarness();
      harness.transport.admins.add('1001:9');

      const high = await harness.pipeline.processMessage(createMockMessage({ userId: '9', text: 'buy drugs here' }));
      const critical = await harness.pipeline.processMessage(
        createMockMessage({ messageId: 'msg-2', userId: '9', text: 'selling loli pics' })
      );

      expect(high.action).toMatchObject({ kind: 'none', reason: 'admin_exempt' });
      expect(critical.action).toMatchObject({ kind: 'delete', reason: 'admin_exempt_delete' });
      expect(harness.transport.operations()).toEqual(['delete']);
      expect(harness.store.records.size).toBe(0);
    });

    test('should keep enforcing while the store is down', async () => {
      harness = createPipelineHarness();
      harness.store.failing.add('saveViolationRecord');
      harness.store.failing.add('logModerationAction');

      const outcome = await harness.pipeline.processMessage(createMockMessage({ text: 'buy drugs here' }));

      expect(outcome.action.kind).toBe('warn');
      expect(harness.transport.operations()).toEqual(['delete', 'warn']);
      expect(harness.ledger.pendingCount()).toBe(1);
    });
  });
});
