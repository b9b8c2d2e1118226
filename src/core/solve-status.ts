/**
 * Solve status state machine
 *
 *   initialized -> starting -> verifying -> success
 *                                        -> failed
 *   starting | verifying -> timeout
 *   any non-terminal -> error
 */

import { TERMINAL_STATUSES } from '../types/index.js';
import type { SolveStatus, StatusChangeCallback, StatusSnapshot } from '../types/index.js';
import { errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';

const TRANSITIONS: Record<SolveStatus, readonly SolveStatus[]> = {
  initialized: ['starting', 'error'],
  starting: ['verifying', 'timeout', 'error'],
  verifying: ['success', 'failed', 'timeout', 'error'],
  success: [],
  failed: [],
  timeout: [],
  error: [],
};

export class SolveStatusTracker {
  private current: SolveStatus = 'initialized';
  private startedAt: number | null = null;
  private finishedAt: number | null = null;
  private lastError: string | null = null;
  private readonly history: SolveStatus[] = ['initialized'];

  constructor(
    private readonly url: string,
    private readonly onChange?: StatusChangeCallback
  ) {}

  get status(): SolveStatus {
    return this.current;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATUSES.has(this.current);
  }

  /**
   * Every status the run has passed through, in order
   */
  getHistory(): readonly SolveStatus[] {
    return [...this.history];
  }

  /**
   * Move to next. Re-entering the current state is a no-op.
   *
   * @throws Error on a transition the state machine does not allow
   */
  transition(next: SolveStatus): void {
    if (next === this.current) {
      return;
    }
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid solve status transition ${this.current} -> ${next}`);
    }

    const from = this.current;
    const now = Date.now();
    if (next === 'starting') {
      this.startedAt = now;
    }
    this.current = next;
    this.history.push(next);
    if (this.isTerminal) {
      this.finishedAt = now;
    }

    try {
      this.onChange?.({ from, to: next, url: this.url, timestamp: now });
    } catch (error) {
      logger.solver.warn('Status listener threw', { from, to: next, error: errorMessage(error) });
    }
  }

  recordError(error: unknown): void {
    this.lastError = errorMessage(error);
  }

  snapshot(): StatusSnapshot {
    const end = this.finishedAt ?? Date.now();
    return {
      status: this.current,
      startTime: this.startedAt === null ? null : new Date(this.startedAt),
      elapsedMs: this.startedAt === null ? null : end - this.startedAt,
      lastError: this.lastError,
    };
  }
}

export function initialSnapshot(): StatusSnapshot {
  return { status: 'initialized', startTime: null, elapsedMs: null, lastError: null };
}
