import { ILogger } from '../core/interfaces/ILogger';

export interface CacheConfig {
  maxSize: number;
  defaultTtl: number; // milliseconds
  cleanupInterval: number; // milliseconds, 0 disables the background sweep
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  hitRate: number;
}

interface Slot<T> {
  value: T;
  expiresAt: number;
}

/**
 * Bounded TTL map with least-recently-used eviction. Map insertion order doubles as
 * recency order: a read moves the key to the back, so the first key is the oldest.
 */
export class CacheManager<T> {
  private slots = new Map<string, Slot<T>>();
  private logger: ILogger;
  private config: CacheConfig;
  private cleanupTimer: NodeJS.Timeout | null = null;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(logger: ILogger, config?: Partial<CacheConfig>, now: () => number = Date.now) {
    this.logger = logger;
    this.now = now;
    this.config = {
      maxSize: 1000,
      defaultTtl: 5 * 60 * 1000,
      cleanupInterval: 60 * 1000,
      ...config
    };

    if (this.config.cleanupInterval > 0) {
      this.cleanupTimer = setInterval(() => this.cleanup(), this.config.cleanupInterval);
      this.cleanupTimer.unref();
    }
  }

  get(key: string): T | undefined {
    const slot = this.live(key);
    if (!slot) {
      this.misses++;
      return undefined;
    }

    this.slots.delete(key);
    this.slots.set(key, slot);
    this.hits++;
    return slot.value;
  }

  set(key: string, value: T, ttl: number = this.config.defaultTtl): void {
    this.slots.delete(key);
    while (this.slots.size >= this.config.maxSize) {
      const oldest = this.slots.keys().next();
      if (oldest.done) break;
      this.slots.delete(oldest.value);
      this.evictions++;
    }
    this.slots.set(key, { value, expiresAt: this.now() + ttl });
  }

  delete(key: string): boolean {
    return this.slots.delete(key);
  }

  /** Presence check that leaves recency and hit counters alone. */
  has(key: string): boolean {
    return this.live(key) !== undefined;
  }

  size(): number {
    return this.slots.size;
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.slots.size,
      hitRate: lookups > 0 ? this.hits / lookups : 0
    };
  }

  cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, slot] of this.slots) {
      if (now > slot.expiresAt) {
        this.slots.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      this.evictions += removed;
      this.logger.debug('Cache cleanup completed', { removed, size: this.slots.size });
    }
    return removed;
  }

  destroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.slots.clear();
  }

  private live(key: string): Slot<T> | undefined {
    const slot = this.slots.get(key);
    if (slot && this.now() > slot.expiresAt) {
      this.slots.delete(key);
      this.evictions++;
      return undefined;
    }
    return slot;
  }
}
