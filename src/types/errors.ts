/**
 * Error taxonomy
 *
 * Every failure surfaced by the pipeline is one of these classes. Browser
 * faults are classified at the attempt boundary; nothing from the driver
 * escapes unwrapped.
 */

export type ChallengeErrorCode =
  | 'CONFIG_INVALID'
  | 'VERIFICATION_FAILED'
  | 'TIMEOUT'
  | 'FORMAT_INVALID'
  | 'ATTEMPTS_EXHAUSTED'
  | 'SESSION_FAILED';

export class ChallengeSolveError extends Error {
  readonly code: ChallengeErrorCode;

  constructor(code: ChallengeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'ChallengeSolveError';
  }
}

/**
 * Invalid construction-time options or call arguments
 */
export class ConfigurationError extends ChallengeSolveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Verification control missing, or clicking it kept failing
 */
export class VerificationError extends ChallengeSolveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('VERIFICATION_FAILED', message, options);
    this.name = 'VerificationError';
  }
}

/**
 * Navigation or resolution deadline exceeded
 */
export class TimeoutError extends ChallengeSolveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TIMEOUT', message, options);
    this.name = 'TimeoutError';
  }
}

/**
 * Malformed cookie/header data from the browser layer
 */
export class FormatError extends ChallengeSolveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FORMAT_INVALID', message, options);
    this.name = 'FormatError';
  }
}

export class ExhaustedAttemptsError extends ChallengeSolveError {
  readonly attempts: number;

  constructor(attempts: number) {
    super('ATTEMPTS_EXHAUSTED', `Challenge not resolved after ${attempts} attempt(s)`);
    this.attempts = attempts;
    this.name = 'ExhaustedAttemptsError';
  }
}

/**
 * The browser session could not be opened (bad executable, launch crash)
 */
export class SessionError extends ChallengeSolveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SESSION_FAILED', message, options);
    this.name = 'SessionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
