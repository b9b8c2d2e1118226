/**
 * Core types for challenge-headers
 */

export * from './errors.js';

/**
 * Lowercase header name to value. Frozen once produced so it can be shared
 * between concurrent callers and cache readers.
 */
export type HeaderSet = Readonly<Record<string, string>>;

/**
 * Cookie as reported by the browser session. Extra fields (domain, path,
 * expiry...) are allowed and ignored.
 */
export interface CookieRecord {
  name: string;
  value: string;
  [key: string]: unknown;
}

/**
 * Lifecycle of a single solve run
 */
export type SolveStatus =
  | 'initialized'
  | 'starting'
  | 'verifying'
  | 'success'
  | 'failed'
  | 'timeout'
  | 'error';

export const TERMINAL_STATUSES: ReadonlySet<SolveStatus> = new Set<SolveStatus>([
  'success',
  'failed',
  'timeout',
  'error',
]);

/**
 * Point-in-time view of the most recent (or in-progress) solve
 */
export interface StatusSnapshot {
  status: SolveStatus;
  /** When the run started, null before any run */
  startTime: Date | null;
  /** Milliseconds since startTime (frozen once the run is terminal) */
  elapsedMs: number | null;
  /** Message of the last error seen by the run */
  lastError: string | null;
}

/**
 * Emitted on every status transition
 */
export interface StatusChangeEvent {
  from: SolveStatus;
  to: SolveStatus;
  url: string;
  timestamp: number;
}

export type StatusChangeCallback = (event: StatusChangeEvent) => void;

/**
 * Result of one pass through the verification loop. The loop branches on
 * `kind` instead of on exception types.
 */
export type AttemptOutcome =
  | { kind: 'success'; headers: HeaderSet; challengeSeen: boolean }
  | { kind: 'retryable'; reason: string }
  | { kind: 'fatal'; error: Error };

/**
 * Snapshot stored in the header cache
 */
export interface CacheEntry {
  readonly headers: HeaderSet;
  readonly createdAt: number;
}
