/**
 * Acquisition Pipeline - public entry point
 *
 * solve(url, userAgent):
 *   cache fast path -> per-key lock -> cache re-check -> session permit ->
 *   ChallengeSolver -> cache write -> optional header dump
 *
 * Concurrent callers for the same (host, proxy host) share one browser
 * run; distinct keys run in parallel up to maxConcurrentTasks.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { HeaderSet, StatusChangeCallback, StatusSnapshot } from '../types/index.js';
import { ConfigurationError, errorMessage } from '../types/errors.js';
import type { BrowserSessionFactory } from './browser-session.js';
import { computeCacheKey, getTargetHost } from './cache-key.js';
import { ChallengeSolver } from './challenge-solver.js';
import { ConcurrencyLimiter } from './concurrency-limiter.js';
import { KeyedLockRegistry } from './keyed-lock.js';
import { createPlaywrightSession } from './playwright-session.js';
import { SolveStatusTracker, initialSnapshot } from './solve-status.js';
import { HeaderCache } from '../utils/cache.js';
import { resolveConfig, type SolverConfig, type SolverConfigInput } from '../utils/config-schemas.js';
import { configureLogger, logger } from '../utils/logger.js';

const log = logger.pipeline;

export interface AcquisitionPipelineOptions {
  /**
   * The logger is reconfigured only when `logging` is given here; it is
   * shared by the whole process.
   */
  config?: SolverConfigInput;
  /** Defaults to the Playwright driver */
  sessionFactory?: BrowserSessionFactory;
  /**
   * Share a cache between pipelines; a private one is created otherwise.
   * An injected cache keeps its own TTL and `cacheTimeoutMs` is ignored.
   */
  cache?: HeaderCache;
  locks?: KeyedLockRegistry;
  /**
   * Share a session budget between pipelines. An injected limiter keeps its
   * own bound and `maxConcurrentTasks` is ignored.
   */
  limiter?: ConcurrencyLimiter;
  onStatusChange?: StatusChangeCallback;
}

export class AcquisitionPipeline {
  readonly config: SolverConfig;
  private readonly cache: HeaderCache;
  private readonly locks: KeyedLockRegistry;
  private readonly limiter: ConcurrencyLimiter;
  private readonly solver: ChallengeSolver;
  private readonly onStatusChange?: StatusChangeCallback;
  private latestRun: SolveStatusTracker | null = null;

  constructor(options: AcquisitionPipelineOptions = {}) {
    this.config = resolveConfig(options.config);
    if (options.config?.logging) {
      configureLogger(this.config.logging);
    }
    warnOnIgnoredLimits(options, this.config);

    this.cache = options.cache ?? new HeaderCache({ ttlMs: this.config.cacheTimeoutMs });
    this.locks = options.locks ?? new KeyedLockRegistry();
    this.limiter = options.limiter ?? new ConcurrencyLimiter(this.config.maxConcurrentTasks);
    this.solver = new ChallengeSolver(this.config, options.sessionFactory ?? createPlaywrightSession);
    this.onStatusChange = options.onStatusChange;
  }

  /**
   * Headers that let a plain HTTP client replay the browser's verified
   * session against url.
   *
   * @throws ConfigurationError for an invalid url or empty userAgent
   * @throws VerificationError | TimeoutError | FormatError |
   *   ExhaustedAttemptsError | SessionError when the solve fails
   */
  async solve(url: string, userAgent: string): Promise<HeaderSet> {
    validateRequest(url, userAgent);
    const cacheKey = computeCacheKey(url, this.config.proxy);

    const cached = this.cache.get(cacheKey);
    if (cached) {
      log.debug('Cache hit', { cacheKey });
      return cached.headers;
    }

    const releaseLock = await this.locks.acquire(cacheKey);
    try {
      // The previous holder may have solved this key while we waited
      const solved = this.cache.get(cacheKey);
      if (solved) {
        log.debug('Cache filled while waiting for lock', { cacheKey });
        return solved.headers;
      }

      const headers = await this.limiter.run(() => this.runSolver(url, userAgent));
      this.cache.put(cacheKey, headers);
      log.info('Headers cached', { cacheKey, ttlMs: this.cache.ttl });

      await this.dumpHeaders(headers);
      return headers;
    } finally {
      releaseLock();
    }
  }

  /**
   * Status of the most recently started solve
   */
  getStatus(): StatusSnapshot {
    return this.latestRun?.snapshot() ?? initialSnapshot();
  }

  clearCache(): void {
    this.cache.clear();
  }

  private runSolver(url: string, userAgent: string): Promise<HeaderSet> {
    const tracker = new SolveStatusTracker(url, this.onStatusChange);
    this.latestRun = tracker;
    return this.solver.solve(url, userAgent, tracker);
  }

  private async dumpHeaders(headers: HeaderSet): Promise<void> {
    const target = this.config.headersOutputPath;
    if (!target) {
      return;
    }
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, `headers = ${JSON.stringify(headers, null, 4)}`, 'utf-8');
      log.debug('Headers written', { path: target });
    } catch (error) {
      log.warn('Failed to write headers file', { path: target, error: errorMessage(error) });
    }
  }
}

/**
 * Injected cache and limiter win over the matching config values; say so
 * when the caller set both to different values
 */
function warnOnIgnoredLimits(options: AcquisitionPipelineOptions, config: SolverConfig): void {
  if (options.cache && options.config?.cacheTimeoutMs !== undefined && options.cache.ttl !== config.cacheTimeoutMs) {
    log.warn('cacheTimeoutMs ignored: the injected cache keeps its own TTL', {
      cacheTimeoutMs: config.cacheTimeoutMs,
      cacheTtlMs: options.cache.ttl,
    });
  }
  if (options.limiter && options.config?.maxConcurrentTasks !== undefined) {
    const { maxConcurrent } = options.limiter.getStats();
    if (maxConcurrent !== config.maxConcurrentTasks) {
      log.warn('maxConcurrentTasks ignored: the injected limiter keeps its own bound', {
        maxConcurrentTasks: config.maxConcurrentTasks,
        limiterMaxConcurrent: maxConcurrent,
      });
    }
  }
}

function validateRequest(url: string, userAgent: string): void {
  const host = getTargetHost(url);
  const protocol = new URL(url).protocol;
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ConfigurationError(`Unsupported URL scheme for ${host}: ${protocol}`);
  }
  if (!userAgent.trim()) {
    throw new ConfigurationError('User agent must not be empty');
  }
}
