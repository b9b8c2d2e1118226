/**
 * Concurrency Limiter
 *
 * Counting permit that bounds the number of simultaneous browser sessions
 * across all cache keys. Orthogonal to the per-key lock: the lock
 * deduplicates work for one key, the limiter protects the host when many
 * distinct keys need a solve at once.
 */

import { logger } from '../utils/logger.js';

export interface ConcurrencyStats {
  /** Permits currently held */
  active: number;
  /** Callers waiting for a permit */
  queued: number;
  /** Highest number of permits held at once */
  peak: number;
  maxConcurrent: number;
  totalAcquired: number;
}

interface QueuedRequest {
  resolve: () => void;
  enqueuedAt: number;
}

export class ConcurrencyLimiter {
  private readonly maxConcurrent: number;
  private activePermits: number = 0;
  private peakPermits: number = 0;
  private totalAcquired: number = 0;
  private requestQueue: QueuedRequest[] = [];

  constructor(maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.maxConcurrent = maxConcurrent;
  }

  /**
   * Acquire a permit, waiting in FIFO order when all are taken.
   * Returns a release function to call when done.
   */
  async acquire(): Promise<() => void> {
    if (this.activePermits < this.maxConcurrent) {
      return this.grant();
    }

    logger.limiter.debug('Waiting for session permit', {
      active: this.activePermits,
      queued: this.requestQueue.length + 1,
    });

    await new Promise<void>((resolve) => {
      this.requestQueue.push({ resolve, enqueuedAt: Date.now() });
    });
    // release() handed its permit over without decrementing
    return this.createRelease();
  }

  /**
   * Run fn while holding a permit
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private grant(): () => void {
    this.activePermits++;
    return this.createRelease();
  }

  private createRelease(): () => void {
    this.totalAcquired++;
    this.peakPermits = Math.max(this.peakPermits, this.activePermits);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.requestQueue.shift();
    if (next) {
      logger.limiter.debug('Handing permit to queued caller', {
        waitedMs: Date.now() - next.enqueuedAt,
      });
      next.resolve();
      return;
    }
    this.activePermits--;
  }

  getStats(): ConcurrencyStats {
    return {
      active: this.activePermits,
      queued: this.requestQueue.length,
      peak: this.peakPermits,
      maxConcurrent: this.maxConcurrent,
      totalAcquired: this.totalAcquired,
    };
  }
}
