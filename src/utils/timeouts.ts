/**
 * Central Timeout Configuration
 *
 * Defaults for the three timeout layers plus the fixed waits between
 * them. All values in milliseconds; SolverConfig overrides each one.
 */

export const TIMEOUTS = {
  /**
   * Navigation / page-load deadline
   */
  PAGE_LOAD: 30000,

  /**
   * Wait after navigation before probing for the challenge frame
   */
  INITIAL_SETTLE: 1000,

  /**
   * How long a clicked verification control may take to disappear
   */
  VERIFY: 10000,

  /**
   * Fixed backoff between click retries and between attempts, also the
   * settle wait after the control disappears
   */
  RETRY_WAIT: 1000,
} as const;
