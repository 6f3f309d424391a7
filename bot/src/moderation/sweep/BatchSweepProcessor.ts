import { IBacklogSource } from '../../core/interfaces/IBacklogSource';
import { ILogger } from '../../core/interfaces/ILogger';
import { IModerationPipeline } from '../../core/interfaces/IModerationPipeline';
import { PendingMessage } from '../../core/interfaces/IModerationStore';
import { ErrorCategory, ErrorHandler, ErrorSeverity } from '../../utils/ErrorHandler';

export interface BatchSweepConfig {
  intervalMs: number;
  concurrency: number;
  pageSize: number;
}

export const DEFAULT_SWEEP_CONFIG: BatchSweepConfig = {
  intervalMs: 30 * 60 * 1000,
  concurrency: 2,
  pageSize: 50
};

export interface SweepReport {
  fetched: number;
  processed: number;
  violations: number;
  /** The pass stopped early because the AI quota is reserved for live traffic. */
  deferred: boolean;
  checkpoint: number;
  durationMs: number;
}

export type SweepState = 'idle' | 'running' | 'paused' | 'stopped';

/**
 * Background pass over the backlog at batch priority. Progress is checkpointed at the
 * highest cursor below which every message has been handled, so an interrupted pass
 * resumes without skipping anything.
 */
export class BatchSweepProcessor {
  private logger: ILogger;
  private errorHandler: ErrorHandler;
  private pipeline: IModerationPipeline;
  private source: IBacklogSource;
  private config: BatchSweepConfig;
  private timer: NodeJS.Timeout | null = null;
  private controller = new AbortController();
  private currentRun: Promise<SweepReport> | null = null;
  private paused = false;
  private stopped = false;
  private lastReport: SweepReport | null = null;

  constructor(
    logger: ILogger,
    errorHandler: ErrorHandler,
    pipeline: IModerationPipeline,
    source: IBacklogSource,
    config: Partial<BatchSweepConfig> = {}
  ) {
    this.logger = logger;
    this.errorHandler = errorHandler;
    this.pipeline = pipeline;
    this.source = source;
    this.config = { ...DEFAULT_SWEEP_CONFIG, ...config };
  }

  start(): void {
    if (this.timer) {
      return;
    }
    if (this.stopped) {
      this.stopped = false;
      this.controller = new AbortController();
    }

    this.timer = setInterval(() => {
      if (this.paused || this.currentRun) {
        return;
      }
      this.runOnce().catch((error: unknown) => {
        this.logger.error('Scheduled sweep failed', { error: String(error) });
      });
    }, this.config.intervalMs);
    this.timer.unref();

    this.logger.info('Batch sweep started', {
      intervalMs: this.config.intervalMs,
      concurrency: this.config.concurrency
    });
  }

  /**
   * Stop pulling new work. Messages already being processed finish normally.
   */
  pause(): void {
    this.paused = true;
    this.logger.info('Batch sweep paused');
  }

  resume(): void {
    this.paused = false;
    this.logger.info('Batch sweep resumed');
  }

  /**
   * Cancel the schedule and abort in-flight AI calls. Resolves once the current pass
   * has wound down.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller.abort();

    if (this.currentRun) {
      try {
        await this.currentRun;
      } catch (error) {
        this.logger.warn('Sweep ended with an error during stop', { error: String(error) });
      }
    }
    this.logger.info('Batch sweep stopped');
  }

  runOnce(): Promise<SweepReport> {
    if (this.currentRun) {
      return this.currentRun;
    }

    this.currentRun = this.sweep().finally(() => {
      this.currentRun = null;
    });
    return this.currentRun;
  }

  getState(): SweepState {
    if (this.stopped) return 'stopped';
    if (this.paused) return 'paused';
    return this.currentRun ? 'running' : 'idle';
  }

  getLastReport(): SweepReport | null {
    return this.lastReport;
  }

  private shouldPull(): boolean {
    return !this.paused && !this.stopped;
  }

  private async sweep(): Promise<SweepReport> {
    const startTime = Date.now();
    const report: SweepReport = {
      fetched: 0,
      processed: 0,
      violations: 0,
      deferred: false,
      checkpoint: await this.source.loadCheckpoint(),
      durationMs: 0
    };

    while (this.shouldPull()) {
      const page = await this.source.fetchPending(report.checkpoint, this.config.pageSize);
      if (page.length === 0) {
        break;
      }
      report.fetched += page.length;

      const completed = await this.processPage(page, report);

      let advanced = report.checkpoint;
      for (const item of page) {
        if (!completed.has(item.cursor)) {
          break;
        }
        advanced = item.cursor;
      }

      if (advanced > report.checkpoint) {
        await this.source.saveCheckpoint(advanced);
        report.checkpoint = advanced;
      }

      if (report.deferred || completed.size < page.length || page.length < this.config.pageSize) {
        break;
      }
    }

    report.durationMs = Date.now() - startTime;
    this.lastReport = report;
    this.logger.info('Sweep pass completed', { ...report });
    return report;
  }

  private async processPage(page: PendingMessage[], report: SweepReport): Promise<Set<number>> {
    const completed = new Set<number>();
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < page.length && !report.deferred && this.shouldPull()) {
        const item = page[next++];
        try {
          const outcome = await this.pipeline.processMessage(item.message, {
            priority: 'batch',
            signal: this.controller.signal
          });

          if (outcome.deferred) {
            report.deferred = true;
            continue;
          }

          completed.add(item.cursor);
          report.processed++;
          if (outcome.verdict && outcome.verdict.severity !== 'none') {
            report.violations++;
          }
        } catch (error) {
          this.errorHandler.handleError(
            error instanceof Error ? error : new Error(String(error)),
            ErrorCategory.UNKNOWN,
            ErrorSeverity.MEDIUM,
            {
              chatId: item.message.chatId,
              messageId: item.message.messageId,
              operation: 'sweep_message',
              component: 'batch_sweep'
            }
          );
        }
      }
    };

    const workers = Array.from({ length: Math.max(1, this.config.concurrency) }, () => worker());
    await Promise.all(workers);
    return completed;
  }
}
