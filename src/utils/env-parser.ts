/**
 * Environment Variable Parser
 *
 * Maps CHALLENGE_* environment variables onto the solver configuration
 * schema. Values are strings; numbers are coerced by the schema, booleans
 * and lists are converted here.
 */

import {
  booleanStringSchema,
  commaSeparatedListSchema,
  parseConfig,
  type SolverConfig,
} from './config-schemas.js';

type Env = Record<string, string | undefined>;

function parseBoolean(value: string | undefined): boolean | undefined {
  return value === undefined ? undefined : booleanStringSchema.parse(value);
}

function parseList(value: string | undefined): string[] | undefined {
  return value === undefined ? undefined : commaSeparatedListSchema.parse(value);
}

/**
 * Parse `NAME:VALUE;NAME:VALUE` into a header template
 */
export function parseHeaderTemplate(value: string | undefined): Record<string, string> | undefined {
  if (value === undefined) return undefined;
  const headers: Record<string, string> = {};
  for (const pair of value.split(';')) {
    const separator = pair.indexOf(':');
    if (separator <= 0) continue;
    const name = pair.slice(0, separator).trim().toLowerCase();
    if (name) {
      headers[name] = pair.slice(separator + 1).trim();
    }
  }
  return headers;
}

/**
 * Drop keys whose value is undefined so schema defaults apply
 */
function compact(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

function mapEnvToSolverConfig(env: Env): Record<string, unknown> {
  return compact({
    browserExecutablePath: env.CHALLENGE_BROWSER_PATH,
    userDataPath: env.CHALLENGE_USER_DATA_PATH,
    headless: parseBoolean(env.CHALLENGE_HEADLESS),
    browserArguments: parseList(env.CHALLENGE_BROWSER_ARGS),
    proxy: env.CHALLENGE_PROXY,
    maxAttempts: env.CHALLENGE_MAX_ATTEMPTS,
    clickMaxAttempts: env.CHALLENGE_CLICK_MAX_ATTEMPTS,
    waitTimeMs: env.CHALLENGE_WAIT_TIME_MS,
    verifyTimeoutMs: env.CHALLENGE_VERIFY_TIMEOUT_MS,
    pageLoadTimeoutMs: env.CHALLENGE_PAGE_LOAD_TIMEOUT_MS,
    initialWaitMs: env.CHALLENGE_INITIAL_WAIT_MS,
    cacheTimeoutMs: env.CHALLENGE_CACHE_TIMEOUT_MS,
    maxConcurrentTasks: env.CHALLENGE_MAX_CONCURRENT_TASKS,
    defaultHeaders: parseHeaderTemplate(env.CHALLENGE_DEFAULT_HEADERS),
    recordingPath: env.CHALLENGE_RECORDING_PATH,
    headersOutputPath: env.CHALLENGE_HEADERS_OUTPUT_PATH,
    saveDebugScreenshots: parseBoolean(env.CHALLENGE_DEBUG_SCREENSHOTS),
    debugScreenshotPath: env.CHALLENGE_DEBUG_SCREENSHOT_PATH,
    logging: compact({
      mode: env.CHALLENGE_LOG_MODE,
      level: env.LOG_LEVEL,
      prettyPrint: parseBoolean(env.LOG_PRETTY),
      filePath: env.CHALLENGE_LOG_FILE,
    }),
  });
}

/**
 * Build a validated SolverConfig from environment variables.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfigFromEnv(env: Env = process.env): SolverConfig {
  return parseConfig(mapEnvToSolverConfig(env), 'environment');
}
