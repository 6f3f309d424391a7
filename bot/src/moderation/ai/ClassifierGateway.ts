import { ILogger } from '../../core/interfaces/ILogger';
import { IClassifierProvider } from '../../core/interfaces/IClassifierProvider';
import { ErrorHandler } from '../../utils/ErrorHandler';
import { ClassificationUnavailable, QuotaExhausted } from '../../utils/errors';
import { QuotaGovernor } from '../quota/QuotaGovernor';
import { createVerdict, ProcessingPriority, Verdict } from '../types';

export type AttemptOutcome = 'quota_denied' | 'timeout' | 'aborted' | 'failed';

export interface ClassifierGatewayConfig {
  /** Per-attempt timeout; each provider gets its own. */
  timeoutMs: number;
}

export interface ClassifyOptions {
  priority?: ProcessingPriority;
  signal?: AbortSignal | undefined;
}

class AttemptTimeout extends Error {
  constructor(timeoutMs: number) {
    super(`Classification attempt exceeded ${timeoutMs}ms`);
    this.name = 'AttemptTimeout';
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Classification aborted');
}

/**
 * Settles with the task, or rejects as soon as the signal fires even if the task
 * ignores it.
 */
function raceAbort<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(abortReason(signal));
  }
  const aborted = new Promise<never>((_, reject) => {
    signal.addEventListener('abort', () => reject(abortReason(signal)), { once: true });
  });
  return Promise.race([task, aborted]);
}

/**
 * Runs the primary classifier and falls back to the secondary one. Every attempt is
 * gated by the quota governor and bounded by its own timeout.
 */
export class ClassifierGateway {
  private logger: ILogger;
  private errorHandler: ErrorHandler;
  private governor: QuotaGovernor;
  private primary: IClassifierProvider;
  private secondary: IClassifierProvider | undefined;
  private config: ClassifierGatewayConfig;

  constructor(
    logger: ILogger,
    errorHandler: ErrorHandler,
    governor: QuotaGovernor,
    providers: { primary: IClassifierProvider; secondary?: IClassifierProvider | undefined },
    config: ClassifierGatewayConfig = { timeoutMs: 10000 }
  ) {
    this.logger = logger;
    this.errorHandler = errorHandler;
    this.governor = governor;
    this.primary = providers.primary;
    this.secondary = providers.secondary;
    this.config = config;
  }

  async classify(text: string, options: ClassifyOptions = {}): Promise<Verdict> {
    const priority = options.priority ?? 'live';
    const attempts: Array<{ provider: string; outcome: AttemptOutcome }> = [];
    const chain: Array<{ provider: IClassifierProvider; source: 'ai-primary' | 'ai-fallback' }> = [
      { provider: this.primary, source: 'ai-primary' }
    ];
    if (this.secondary) {
      chain.push({ provider: this.secondary, source: 'ai-fallback' });
    }

    for (const { provider, source } of chain) {
      if (options.signal?.aborted) {
        attempts.push({ provider: provider.name, outcome: 'aborted' });
        break;
      }

      try {
        const verdict = await this.attempt(provider, source, text, priority, options.signal);
        if (source === 'ai-fallback') {
          this.logger.info('Fallback classifier used', { provider: provider.name, priority });
        }
        return verdict;
      } catch (error) {
        const outcome = this.classifyFailure(error, options.signal);
        attempts.push({ provider: provider.name, outcome });
        this.reportFailure(error, provider.name, outcome, priority);
      }
    }

    throw new ClassificationUnavailable(attempts);
  }

  providerNames(): string[] {
    return this.secondary ? [this.primary.name, this.secondary.name] : [this.primary.name];
  }

  private async attempt(
    provider: IClassifierProvider,
    source: 'ai-primary' | 'ai-fallback',
    text: string,
    priority: ProcessingPriority,
    callerSignal: AbortSignal | undefined
  ): Promise<Verdict> {
    const reservation = this.governor.tryReserve(provider.name, priority);
    if (!reservation) {
      throw new QuotaExhausted(provider.name);
    }

    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(callerSignal?.reason);
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    const timer = setTimeout(() => controller.abort(new AttemptTimeout(this.config.timeoutMs)), this.config.timeoutMs);
    timer.unref();

    try {
      const raw = await raceAbort(provider.classify(text, controller.signal), controller.signal);
      const normalized = provider.normalize(raw);
      return createVerdict({ ...normalized, source });
    } catch (error) {
      // The provider may reject with its own cancel error before the race sees the timeout.
      const reason: unknown = controller.signal.reason;
      if (reason instanceof AttemptTimeout && !callerSignal?.aborted) {
        throw reason;
      }
      throw error;
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
      this.governor.release(reservation);
    }
  }

  private classifyFailure(error: unknown, callerSignal: AbortSignal | undefined): AttemptOutcome {
    if (error instanceof QuotaExhausted) return 'quota_denied';
    if (callerSignal?.aborted) return 'aborted';
    if (error instanceof AttemptTimeout) return 'timeout';
    return 'failed';
  }

  private reportFailure(error: unknown, provider: string, outcome: AttemptOutcome, priority: ProcessingPriority): void {
    switch (outcome) {
      case 'quota_denied':
        this.logger.warn('Classifier quota exhausted', { provider, priority });
        return;
      case 'aborted':
        this.logger.debug('Classification aborted by caller', { provider });
        return;
      case 'timeout':
        this.errorHandler.handleTimeoutError('classify', this.config.timeoutMs, {
          component: 'classifier_gateway',
          metadata: { provider }
        });
        return;
      case 'failed':
        this.errorHandler.handleProviderError(
          error instanceof Error ? error : new Error(String(error)),
          provider
        );
        return;
    }
  }
}
