/**
 * @module keyed-lock
 * Per-key async mutual exclusion.
 *
 * Each key gets its own single-slot semaphore, created on first use and
 * dropped once nobody holds or waits for it. Multi-key acquisition always
 * takes keys in sorted order so two batches over overlapping keys cannot
 * deadlock.
 */

// =====================================================================
// Semaphore - generic async concurrency limiter
// =====================================================================

export class Semaphore {
  private current = 0;
  private readonly waiters: Array<() => void> = [];
  private readonly max: number;

  constructor(max: number) {
    if (max < 1) throw new Error('Semaphore max must be >= 1');
    this.max = max;
  }

  async acquire(): Promise<void> {
    if (this.current < this.max) {
      this.current++;
      return;
    }
    return new Promise<void>(resolve => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else if (this.current > 0) {
      this.current--;
    }
  }

  get available(): number {
    return this.max - this.current;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /** True when nothing holds or waits on this semaphore. */
  get idle(): boolean {
    return this.current === 0 && this.waiters.length === 0;
  }
}

// =====================================================================
// KeyedLock
// =====================================================================

export class KeyedLock {
  private readonly locks = new Map<string, Semaphore>();

  /** Run `fn` while holding the lock for `key`. */
  async withLock<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    return this.withLocks([key], fn);
  }

  /** Run `fn` while holding every key (deduplicated, acquired in sorted order). */
  async withLocks<T>(keys: readonly string[], fn: () => T | Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const held: string[] = [];
    try {
      for (const key of ordered) {
        await this.semaphoreFor(key).acquire();
        held.push(key);
      }
      return await fn();
    } finally {
      for (const key of held.reverse()) {
        this.release(key);
      }
    }
  }

  /** Keys currently held or awaited. */
  get size(): number {
    return this.locks.size;
  }

  private semaphoreFor(key: string): Semaphore {
    let sem = this.locks.get(key);
    if (!sem) {
      sem = new Semaphore(1);
      this.locks.set(key, sem);
    }
    return sem;
  }

  private release(key: string): void {
    const sem = this.locks.get(key);
    if (!sem) return;
    sem.release();
    if (sem.idle) this.locks.delete(key);
  }
}
