import { ILogger } from '../../core/interfaces/ILogger';
import { ProcessingPriority } from '../types';

export interface ProviderQuotaConfig {
  /** Calls allowed per rolling window. */
  limit: number;
  windowMs: number;
  maxInFlight: number;
  /** Window capacity that batch work may never consume. */
  liveReserve: number;
  /** Batch work is refused for this long after a live request was turned away. */
  liveBackoffMs: number;
}

export const DEFAULT_PROVIDER_QUOTA: ProviderQuotaConfig = {
  limit: 60,
  windowMs: 60 * 1000,
  maxInFlight: 8,
  liveReserve: 10,
  liveBackoffMs: 30 * 1000
};

export interface Reservation {
  readonly id: number;
  readonly provider: string;
  readonly priority: ProcessingPriority;
  readonly reservedAt: number;
}

export interface QuotaUsage {
  provider: string;
  used: number;
  limit: number;
  remaining: number;
  inFlight: number;
  maxInFlight: number;
  windowMs: number;
  deniedLive: number;
  deniedBatch: number;
}

interface ProviderState {
  config: ProviderQuotaConfig;
  calls: number[];
  active: Set<number>;
  lastLiveDenialAt: number | null;
  deniedLive: number;
  deniedBatch: number;
}

/**
 * Per-provider rolling-window quota. Reserving is synchronous, so a check and its
 * bookkeeping happen in the same tick and two callers can never both take the last slot.
 */
export class QuotaGovernor {
  private logger: ILogger;
  private providers = new Map<string, ProviderState>();
  private pruneTimer: NodeJS.Timeout | null = null;
  private nextId = 1;
  private readonly now: () => number;

  constructor(
    logger: ILogger,
    providers: Record<string, Partial<ProviderQuotaConfig>> = {},
    now: () => number = Date.now
  ) {
    this.logger = logger;
    this.now = now;

    for (const [name, config] of Object.entries(providers)) {
      this.register(name, config);
    }
  }

  register(provider: string, config: Partial<ProviderQuotaConfig> = {}): void {
    this.providers.set(provider, {
      config: { ...DEFAULT_PROVIDER_QUOTA, ...config },
      calls: [],
      active: new Set(),
      lastLiveDenialAt: null,
      deniedLive: 0,
      deniedBatch: 0
    });
  }

  tryReserve(provider: string, priority: ProcessingPriority = 'live'): Reservation | null {
    const state = this.providers.get(provider);
    if (!state) {
      this.logger.warn('Quota requested for unregistered provider', { provider });
      return null;
    }

    const now = this.now();
    this.prune(state, now);

    const { config } = state;
    const remaining = config.limit - state.calls.length;
    const saturated = remaining <= 0 || state.active.size >= config.maxInFlight;

    if (priority === 'live') {
      if (saturated) {
        state.deniedLive++;
        state.lastLiveDenialAt = now;
        return null;
      }
    } else {
      const liveRecentlyStarved =
        state.lastLiveDenialAt !== null && now - state.lastLiveDenialAt < config.liveBackoffMs;
      if (saturated || remaining <= config.liveReserve || liveRecentlyStarved) {
        state.deniedBatch++;
        return null;
      }
    }

    const reservation: Reservation = Object.freeze({
      id: this.nextId++,
      provider,
      priority,
      reservedAt: now
    });
    state.calls.push(now);
    state.active.add(reservation.id);
    return reservation;
  }

  /**
   * Free the in-flight slot. The call still counts against the window. Releasing
   * twice is a no-op.
   */
  release(reservation: Reservation): void {
    const state = this.providers.get(reservation.provider);
    state?.active.delete(reservation.id);
  }

  usage(provider: string): QuotaUsage | undefined {
    const state = this.providers.get(provider);
    if (!state) {
      return undefined;
    }

    this.prune(state, this.now());
    return {
      provider,
      used: state.calls.length,
      limit: state.config.limit,
      remaining: Math.max(0, state.config.limit - state.calls.length),
      inFlight: state.active.size,
      maxInFlight: state.config.maxInFlight,
      windowMs: state.config.windowMs,
      deniedLive: state.deniedLive,
      deniedBatch: state.deniedBatch
    };
  }

  snapshot(): QuotaUsage[] {
    const result: QuotaUsage[] = [];
    for (const provider of this.providers.keys()) {
      const usage = this.usage(provider);
      if (usage) {
        result.push(usage);
      }
    }
    return result;
  }

  start(pruneIntervalMs: number = 60 * 1000): void {
    if (this.pruneTimer) {
      return;
    }

    this.pruneTimer = setInterval(() => {
      const now = this.now();
      for (const state of this.providers.values()) {
        this.prune(state, now);
      }
    }, pruneIntervalMs);
    this.pruneTimer.unref();
  }

  stop(): void {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = null;
    }
  }

  private prune(state: ProviderState, now: number): void {
    const cutoff = now - state.config.windowMs;
    let expired = 0;
    while (expired < state.calls.length && state.calls[expired] <= cutoff) {
      expired++;
    }
    if (expired > 0) {
      state.calls.splice(0, expired);
    }
  }
}
