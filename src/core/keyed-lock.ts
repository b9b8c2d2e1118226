/**
 * Keyed Lock Registry - per-key FIFO mutex
 *
 * Gives single-flight semantics to the acquisition pipeline: at most one
 * holder per key at a time, waiters served in arrival order.
 *
 * Lifecycle: an entry is created by the first acquire() for a key and
 * removed when its last holder releases with nobody queued behind it, so
 * the registry only ever holds keys with work in flight.
 */

interface LockEntry {
  /** Settles when the most recently queued holder releases */
  tail: Promise<void>;
  /** Holder plus queued waiters */
  pending: number;
}

export type ReleaseFn = () => void;

export class KeyedLockRegistry {
  private locks: Map<string, LockEntry> = new Map();

  /**
   * Wait for exclusive access to key. The returned function releases it;
   * calling it more than once has no further effect.
   */
  async acquire(key: string): Promise<ReleaseFn> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { tail: Promise.resolve(), pending: 0 };
      this.locks.set(key, entry);
    }

    let unlock: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });

    const previous = entry.tail;
    entry.tail = held;
    entry.pending++;

    await previous;

    const owned = entry;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      owned.pending--;
      if (owned.pending === 0 && this.locks.get(key) === owned) {
        this.locks.delete(key);
      }
      unlock();
    };
  }

  /**
   * Run fn while holding the lock for key
   */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  /**
   * Number of keys with a holder or waiter
   */
  get size(): number {
    return this.locks.size;
  }
}
