/**
 * challenge-headers
 *
 * Solve an interactive bot-verification challenge once in a real browser,
 * then hand the resulting cookies and fingerprint headers to any HTTP
 * client.
 *
 * @example
 * ```typescript
 * import { createPipeline } from 'challenge-headers';
 *
 * const pipeline = createPipeline({ proxy: 'socks5://127.0.0.1:1080' });
 * const headers = await pipeline.solve('https://example.com/', userAgent);
 * await fetch('https://example.com/api', { headers });
 * ```
 */

import {
  AcquisitionPipeline,
  type AcquisitionPipelineOptions,
} from './core/acquisition-pipeline.js';
import type { SolverConfigInput } from './utils/config-schemas.js';
import { loadConfigFromEnv } from './utils/env-parser.js';

// Pipeline
export { AcquisitionPipeline } from './core/acquisition-pipeline.js';
export type { AcquisitionPipelineOptions } from './core/acquisition-pipeline.js';
export {
  ChallengeSolver,
  CHALLENGE_ORIGIN,
  VERIFY_PROMPTS,
  isVerifyPrompt,
  terminalStatusFor,
} from './core/challenge-solver.js';
export { SolveStatusTracker } from './core/solve-status.js';

// Building blocks
export { HeaderCache } from './utils/cache.js';
export { KeyedLockRegistry } from './core/keyed-lock.js';
export type { ReleaseFn } from './core/keyed-lock.js';
export { ConcurrencyLimiter } from './core/concurrency-limiter.js';
export type { ConcurrencyStats } from './core/concurrency-limiter.js';
export { computeCacheKey, getProxyHost, getTargetHost, DIRECT_CONNECTION } from './core/cache-key.js';
export { buildHeaders, parseCookies, serializeCookies } from './core/header-builder.js';

// Browser sessions
export type {
  BrowserSession,
  BrowserSessionFactory,
  BrowserSessionOptions,
  ControlPredicate,
} from './core/browser-session.js';
export { PlaywrightSession, createPlaywrightSession } from './core/playwright-session.js';

// Configuration and logging
export {
  solverConfigSchema,
  resolveConfig,
  parseConfig,
  DEFAULT_HEADER_TEMPLATE,
  HARDENING_ARGUMENTS,
} from './utils/config-schemas.js';
export type { SolverConfig, SolverConfigInput } from './utils/config-schemas.js';
export { loadConfigFromEnv } from './utils/env-parser.js';
export { closeLogger, configureLogger, logger } from './utils/logger.js';
export type { LoggerConfig, LoggingMode, LogLevel } from './utils/logger.js';

// Types and errors
export * from './types/index.js';

/**
 * Pipeline configured from CHALLENGE_* environment variables, with
 * explicit options taking precedence.
 */
export function createPipeline(
  config: SolverConfigInput = {},
  options: Omit<AcquisitionPipelineOptions, 'config'> = {}
): AcquisitionPipeline {
  const fromEnv = loadConfigFromEnv();
  return new AcquisitionPipeline({ ...options, config: { ...fromEnv, ...config } });
}
