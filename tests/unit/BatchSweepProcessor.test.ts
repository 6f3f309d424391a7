/**
 * Backlog sweep at batch priority: checkpoints, quota deferral, pause and stop
 */

import { describe, test, expect, afterEach } from '@jest/globals';
import { BatchSweepConfig, BatchSweepProcessor } from '../../bot/src/moderation/sweep/BatchSweepProcessor';
import { DatabaseBacklogSource } from '../../bot/src/moderation/sweep/DatabaseBacklogSource';
import { createMockMessage, createPipelineHarness, PipelineHarness, PipelineHarnessOptions } from '../setup';

describe('BatchSweepProcessor', () => {
  let harness: PipelineHarness;
  let sweep: BatchSweepProcessor;

  const setup = async (
    texts: string[],
    config: Partial<BatchSweepConfig> = {},
    options: PipelineHarnessOptions = {}
  ): Promise<void> => {
    harness = createPipelineHarness(options);
    for (const [index, text] of texts.entries()) {
      await harness.store.enqueuePendingMessage(createMockMessage({ messageId: `m-${index + 1}`, text }));
    }
    sweep = new BatchSweepProcessor(
      harness.logger,
      harness.errorHandler,
      harness.pipeline,
      new DatabaseBacklogSource(harness.store),
      { concurrency: 1, pageSize: 10, ...config }
    );
  };

  afterEach(async () => {
    await sweep.stop();
    harness.dispose();
  });

  test('should process the backlog and checkpoint past it', async () => {
    await setup(['buy drugs here', 'hello everyone']);

    const report = await sweep.runOnce();

    expect(report).toMatchObject({ fetched: 2, processed: 2, violations: 1, deferred: false, checkpoint: 2 });
    expect(harness.store.checkpoints.get('batch_sweep')).toBe(2);
    expect(harness.store.pending).toEqual([]);
    expect(harness.transport.operations()).toEqual(['delete', 'warn']);
    expect(sweep.getLastReport()).toEqual(report);
  });

  test('should page through the backlog', async () => {
    await setup(['hello one', 'hello two', 'hello three', 'hello four', 'hello five'], { pageSize: 2 });

    const report = await sweep.runOnce();

    expect(report).toMatchObject({ fetched: 5, processed: 5, checkpoint: 5 });
    expect(harness.primary.calls).toEqual(['hello one', 'hello two', 'hello three', 'hello four', 'hello five']);
  });

  test('should defer once the batch share of the quota is spent', async () => {
    await setup(['hello one', 'hello two', 'hello three', 'hello four'], {}, { quota: { limit: 2, liveReserve: 1 } });

    const report = await sweep.runOnce();

    expect(report).toMatchObject({ fetched: 4, processed: 2, deferred: true, checkpoint: 2 });
    expect(harness.primary.calls).toEqual(['hello one']);
    expect(harness.fallback.calls).toEqual(['hello two']);
    expect(harness.store.pending.map(item => item.cursor)).toEqual([3, 4]);
  });

  test('should resume from the saved checkpoint', async () => {
    await setup(['hello one', 'hello two']);
    await harness.store.setSweepCheckpoint('batch_sweep', 1);

    const report = await sweep.runOnce();

    expect(report).toMatchObject({ fetched: 1, processed: 1, checkpoint: 2 });
    expect(harness.primary.calls).toEqual(['hello two']);
  });

  test('should share a pass between concurrent callers', async () => {
    await setup(['hello one']);

    const first = sweep.runOnce();
    const second = sweep.runOnce();

    expect(second).toBe(first);
    await first;
    expect(harness.primary.calls).toHaveLength(1);
  });

  test('should not pull work while paused', async () => {
    await setup(['hello one']);
    sweep.pause();

    expect(sweep.getState()).toBe('paused');
    expect((await sweep.runOnce()).fetched).toBe(0);

    sweep.resume();
    expect(sweep.getState()).toBe('idle');
  });

  test('should abort in-flight classification on stop and keep the message queued', async () => {
    await setup(['hello one'], {}, { primarySteps: [{ kind: 'hang' }] });

    const run = sweep.runOnce();
    await new Promise(resolve => setTimeout(resolve, 20));
    expect(sweep.getState()).toBe('running');

    await sweep.stop();
    const report = await run;

    expect(report).toMatchObject({ fetched: 1, processed: 0, deferred: true, checkpoint: 0 });
    expect(harness.store.pending).toHaveLength(1);
    expect(harness.fallback.calls).toHaveLength(0);
    expect(sweep.getState()).toBe('stopped');
  });
});
