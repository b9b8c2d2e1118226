/**
 * Challenge Solver
 *
 * Drives one BrowserSession through the verification loop:
 *
 * 1. Open a session with the caller's user agent, the proxy and the
 *    hardening flags; navigate and let the page settle
 * 2. Up to maxAttempts times: find the challenge frame, find the
 *    verification control, click it (with click retries), wait for it to
 *    disappear
 * 3. On success read cookies and build the header set while the session
 *    is still open
 * 4. Always stop recording and close the session
 *
 * Each attempt yields a tagged AttemptOutcome; the loop branches on the
 * tag. Browser faults are converted to TimeoutError at the call site.
 */

import type { AttemptOutcome, HeaderSet, SolveStatus } from '../types/index.js';
import {
  ChallengeSolveError,
  ExhaustedAttemptsError,
  SessionError,
  TimeoutError,
  VerificationError,
  errorMessage,
} from '../types/errors.js';
import type {
  BrowserSession,
  BrowserSessionFactory,
  BrowserSessionOptions,
  ControlPredicate,
} from './browser-session.js';
import { buildHeaders } from './header-builder.js';
import { SolveStatusTracker } from './solve-status.js';
import { HARDENING_ARGUMENTS, type SolverConfig } from '../utils/config-schemas.js';
import { RetryExhaustedError, withRetry } from '../utils/retry.js';
import { logger, type Logger } from '../utils/logger.js';

// ============================================
// CONSTANTS
// ============================================

/** Source prefix of the challenge provider's iframe */
export const CHALLENGE_ORIGIN = 'https://challenges.cloudflare.com/';

/** Verification prompts, matched exactly and case-sensitively */
export const VERIFY_PROMPTS: readonly string[] = [
  'Verify you are human',
  '确认您是真人',
  '确认您是人类',
  'Verify that you are human',
  '请验证您是人类',
];

export const isVerifyPrompt: ControlPredicate = (text) => VERIFY_PROMPTS.includes(text);

// ============================================
// TYPES
// ============================================

interface RunContext {
  session: BrowserSession;
  url: string;
  userAgent: string;
  log: Logger;
}

// ============================================
// MAIN CLASS
// ============================================

export class ChallengeSolver {
  constructor(
    private readonly config: SolverConfig,
    private readonly sessionFactory: BrowserSessionFactory
  ) {}

  /**
   * Solve the challenge at url and return the replayable headers.
   * The tracker receives every status transition of the run.
   */
  async solve(
    url: string,
    userAgent: string,
    tracker: SolveStatusTracker = new SolveStatusTracker(url)
  ): Promise<HeaderSet> {
    const log = logger.solver.child({ url });
    const startTime = Date.now();

    tracker.transition('starting');

    let session: BrowserSession;
    try {
      session = await this.sessionFactory(this.sessionOptions(userAgent));
    } catch (error) {
      const failure = new SessionError(`Failed to open browser session: ${errorMessage(error)}`, {
        cause: error,
      });
      this.fail(tracker, failure);
      log.error('Browser session could not be opened', { error });
      throw failure;
    }

    const ctx: RunContext = { session, url, userAgent, log };
    let recording = false;

    try {
      recording = await this.startRecording(ctx);

      log.info('Navigating to target');
      await guard('Navigation', () => session.navigate(url, this.config.pageLoadTimeoutMs));
      await guard('Initial settle', () => session.settle(this.config.initialWaitMs));

      tracker.transition('verifying');
      const headers = await this.runAttempts(ctx);

      tracker.transition('success');
      log.timed('Challenge solved', startTime);
      return headers;
    } catch (error) {
      this.fail(tracker, error);
      log.warn('Challenge solve failed', {
        status: tracker.status,
        durationMs: Date.now() - startTime,
        error: errorMessage(error),
      });
      throw error;
    } finally {
      await this.cleanup(ctx, recording);
    }
  }

  private sessionOptions(userAgent: string): BrowserSessionOptions {
    return {
      userAgent,
      proxy: this.config.proxy,
      executablePath: this.config.browserExecutablePath,
      userDataPath: this.config.userDataPath,
      headless: this.config.headless,
      args: [...new Set([...HARDENING_ARGUMENTS, ...this.config.browserArguments])],
      screenshotDir: this.config.saveDebugScreenshots ? this.config.debugScreenshotPath : undefined,
      recordingDir: this.config.recordingPath,
    };
  }

  /**
   * Outer loop: at most maxAttempts attempts, a fixed wait between them
   */
  private async runAttempts(ctx: RunContext): Promise<HeaderSet> {
    const { maxAttempts, waitTimeMs } = this.config;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      ctx.log.debug('Verification attempt', { attempt, maxAttempts });
      const outcome = await this.attempt(ctx);

      switch (outcome.kind) {
        case 'success':
          if (!outcome.challengeSeen) {
            ctx.log.info('No challenge present');
          }
          return outcome.headers;

        case 'fatal':
          throw outcome.error;

        case 'retryable':
          ctx.log.debug('Attempt did not resolve the challenge', { attempt, reason: outcome.reason });
          if (attempt < maxAttempts) {
            await guard('Retry wait', () => ctx.session.settle(waitTimeMs));
          }
          break;
      }
    }

    throw new ExhaustedAttemptsError(maxAttempts);
  }

  /**
   * One pass over the challenge. Typed failures become a fatal outcome;
   * anything else is a bug and propagates.
   */
  private async attempt(ctx: RunContext): Promise<AttemptOutcome> {
    const { session } = ctx;
    const { clickMaxAttempts, waitTimeMs, verifyTimeoutMs } = this.config;

    try {
      const frame = await guard('Challenge frame lookup', () => session.findChallengeFrame(CHALLENGE_ORIGIN));
      if (frame === null) {
        return { kind: 'success', headers: await this.collectHeaders(ctx), challengeSeen: false };
      }

      await this.captureDebug(ctx, 'before_verification');

      const control = await guard('Verification control lookup', () =>
        session.findControl(frame, isVerifyPrompt)
      );
      if (control === null) {
        await this.captureDebug(ctx, 'no_verify_button');
        return { kind: 'fatal', error: new VerificationError('Verification control not found in challenge frame') };
      }

      try {
        await withRetry(() => session.click(control), {
          maxAttempts: clickMaxAttempts,
          initialDelayMs: waitTimeMs,
          backoffMultiplier: 1,
          onRetry: (attempt) => this.captureDebug(ctx, `click_failed_${attempt - 1}`),
        });
      } catch (error) {
        await this.captureDebug(ctx, `click_failed_${clickMaxAttempts - 1}`);
        const cause = error instanceof RetryExhaustedError ? error.lastError : error;
        return {
          kind: 'fatal',
          error: new VerificationError(`Clicking verification control failed: ${errorMessage(cause)}`, { cause }),
        };
      }
      ctx.log.debug('Verification control clicked');

      const removed = await guard('Verification wait', () => session.waitRemoved(control, verifyTimeoutMs));
      if (!removed) {
        return { kind: 'retryable', reason: `control still present after ${verifyTimeoutMs}ms` };
      }

      await guard('Post-verification settle', () => session.settle(waitTimeMs));
      await this.captureDebug(ctx, 'after_verification');

      // A control that came back is a renewed challenge, not a pass
      if (await this.controlPresent(ctx)) {
        return { kind: 'retryable', reason: 'verification control reappeared' };
      }

      return { kind: 'success', headers: await this.collectHeaders(ctx), challengeSeen: true };
    } catch (error) {
      if (error instanceof ChallengeSolveError) {
        return { kind: 'fatal', error };
      }
      throw error;
    }
  }

  private async controlPresent(ctx: RunContext): Promise<boolean> {
    const frame = await guard('Challenge frame lookup', () => ctx.session.findChallengeFrame(CHALLENGE_ORIGIN));
    if (frame === null) {
      return false;
    }
    const control = await guard('Verification control lookup', () =>
      ctx.session.findControl(frame, isVerifyPrompt)
    );
    return control !== null;
  }

  private async collectHeaders(ctx: RunContext): Promise<HeaderSet> {
    const cookies = await guard('Reading cookies', () => ctx.session.readCookies());
    return buildHeaders({
      cookies,
      url: ctx.url,
      userAgent: ctx.userAgent,
      template: this.config.defaultHeaders,
    });
  }

  private async startRecording(ctx: RunContext): Promise<boolean> {
    if (!this.config.recordingPath || !ctx.session.startRecording) {
      return false;
    }
    try {
      await ctx.session.startRecording();
      return true;
    } catch (error) {
      ctx.log.warn('Recording could not be started', { error: errorMessage(error) });
      return false;
    }
  }

  private async captureDebug(ctx: RunContext, label: string): Promise<void> {
    if (!this.config.saveDebugScreenshots || !ctx.session.screenshot) {
      return;
    }
    try {
      const path = await ctx.session.screenshot(label);
      ctx.log.debug('Saved debug screenshot', { path });
    } catch (error) {
      ctx.log.warn('Debug screenshot failed', { label, error: errorMessage(error) });
    }
  }

  /**
   * Stop recording, then close. Never throws over the run's own outcome.
   */
  private async cleanup(ctx: RunContext, recording: boolean): Promise<void> {
    if (recording && ctx.session.stopRecording) {
      try {
        const path = await ctx.session.stopRecording();
        if (path) {
          ctx.log.info('Recording saved', { path });
        }
      } catch (error) {
        ctx.log.warn('Recording could not be stopped', { error: errorMessage(error) });
      }
    }

    try {
      await ctx.session.close();
    } catch (error) {
      ctx.log.warn('Browser session did not close cleanly', { error: errorMessage(error) });
    }
  }

  private fail(tracker: SolveStatusTracker, error: unknown): void {
    tracker.recordError(error);
    if (!tracker.isTerminal) {
      tracker.transition(terminalStatusFor(error));
    }
  }
}

// ============================================
// HELPERS
// ============================================

/**
 * Run a browser operation, converting untyped driver faults into
 * TimeoutError. Typed errors pass through.
 */
async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ChallengeSolveError) {
      throw error;
    }
    throw new TimeoutError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
  }
}

export function terminalStatusFor(error: unknown): SolveStatus {
  if (error instanceof TimeoutError) {
    return 'timeout';
  }
  if (error instanceof VerificationError || error instanceof ExhaustedAttemptsError) {
    return 'failed';
  }
  return 'error';
}
