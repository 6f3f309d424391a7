/**
 * FIFO mutex for async critical sections.
 *
 * ```
 * const release = await mutex.acquire();
 * try {
 *   // critical section
 * } finally {
 *   release();
 * }
 * ```
 */
export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          let released = false;
          resolve(() => {
            if (!released) {
              released = true;
              this.release();
            }
          });
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      this.locked = false;
      next();
    } else {
      this.locked = false;
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  hasWaiters(): boolean {
    return this.queue.length > 0;
  }
}

/** A place in a key's queue, taken now and waited on later. */
export interface Ticket {
  /** Settles once every earlier holder of the key has released. */
  readonly turn: Promise<void>;
  /** Frees the place; before the turn arrives this just hands it on when it does. */
  release(): void;
}

/**
 * One mutex per key. Idle mutexes are dropped on release so the map only holds contended keys.
 */
export class KeyedMutex {
  private mutexes = new Map<string, Mutex>();

  async acquire(key: string): Promise<() => void> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(key, mutex);
    }

    const owned = mutex;
    const release = await owned.acquire();
    return () => {
      release();
      if (!owned.isLocked() && !owned.hasWaiters() && this.mutexes.get(key) === owned) {
        this.mutexes.delete(key);
      }
    };
  }

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await task();
    } finally {
      release();
    }
  }

  reserve(key: string): Ticket {
    const acquired = this.acquire(key);
    let released = false;
    return {
      turn: acquired.then(() => undefined),
      release: () => {
        if (released) return;
        released = true;
        void acquired.then(done => done());
      }
    };
  }

  isLocked(key: string): boolean {
    return this.mutexes.get(key)?.isLocked() ?? false;
  }

  size(): number {
    return this.mutexes.size;
  }
}
