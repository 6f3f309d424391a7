import { ILogger } from '../../core/interfaces/ILogger';
import { CacheManager, CacheConfig } from '../../performance/CacheManager';
import { createVerdict, Verdict } from '../types';

export interface ClassifierCacheConfig {
  ttlMs: number;
  maxSize: number;
  cleanupIntervalMs: number;
}

export const DEFAULT_CLASSIFIER_CACHE_CONFIG: ClassifierCacheConfig = {
  ttlMs: 60 * 60 * 1000,
  maxSize: 10000,
  cleanupIntervalMs: 60 * 1000
};

/**
 * Verdicts keyed by content fingerprint. Cache faults never reach the caller:
 * a failed lookup is a miss and a failed store is dropped.
 */
export class ClassifierCache {
  private cache: CacheManager<Verdict>;
  private logger: ILogger;

  constructor(logger: ILogger, config: Partial<ClassifierCacheConfig> = {}, cache?: CacheManager<Verdict>) {
    this.logger = logger;
    const settings = { ...DEFAULT_CLASSIFIER_CACHE_CONFIG, ...config };
    const managerConfig: Partial<CacheConfig> = {
      defaultTtl: settings.ttlMs,
      maxSize: settings.maxSize,
      cleanupInterval: settings.cleanupIntervalMs
    };
    this.cache = cache ?? new CacheManager<Verdict>(logger, managerConfig);
  }

  lookup(fingerprint: string): Verdict | undefined {
    try {
      const cached = this.cache.get(fingerprint);
      if (!cached) {
        return undefined;
      }

      return createVerdict({
        category: cached.category,
        severity: cached.severity,
        confidence: cached.confidence,
        needsReview: cached.needsReview,
        reason: cached.reason,
        matchedRule: cached.matchedRule,
        source: 'cache',
        origin: cached.source === 'cache' ? cached.origin : cached.source
      });
    } catch (error) {
      this.logger.warn('Classifier cache lookup failed, treating as miss', {
        fingerprint,
        error: String(error)
      });
      return undefined;
    }
  }

  store(fingerprint: string, verdict: Verdict, ttlMs?: number): void {
    try {
      this.cache.set(fingerprint, verdict, ttlMs);
    } catch (error) {
      this.logger.warn('Classifier cache store failed', {
        fingerprint,
        error: String(error)
      });
    }
  }

  getHitRate(): number {
    try {
      return this.cache.getStats().hitRate;
    } catch (error) {
      this.logger.warn('Classifier cache stats unavailable', { error: String(error) });
      return 0;
    }
  }

  size(): number {
    return this.cache.size();
  }

  destroy(): void {
    this.cache.destroy();
  }
}
