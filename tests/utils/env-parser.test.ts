import { describe, it, expect } from 'vitest';
import { loadConfigFromEnv, parseHeaderTemplate } from '../../src/utils/env-parser.js';
import { ConfigurationError } from '../../src/types/errors.js';

describe('loadConfigFromEnv', () => {
  it('should use defaults for an empty environment', () => {
    const config = loadConfigFromEnv({});

    expect(config.maxAttempts).toBe(10);
    expect(config.headless).toBe(true);
    expect(config.logging.mode).toBe('console');
  });

  it('should coerce CHALLENGE_* variables', () => {
    const config = loadConfigFromEnv({
      CHALLENGE_PROXY: 'http://10.0.0.1:3128',
      CHALLENGE_HEADLESS: 'false',
      CHALLENGE_BROWSER_ARGS: '--lang=en-US, --window-size=1280,800',
      CHALLENGE_MAX_ATTEMPTS: '4',
      CHALLENGE_CLICK_MAX_ATTEMPTS: '2',
      CHALLENGE_WAIT_TIME_MS: '250',
      CHALLENGE_CACHE_TIMEOUT_MS: '60000',
      CHALLENGE_MAX_CONCURRENT_TASKS: '8',
      CHALLENGE_DEBUG_SCREENSHOTS: 'yes',
      CHALLENGE_HEADERS_OUTPUT_PATH: '/tmp/headers.txt',
      CHALLENGE_LOG_MODE: 'file',
      CHALLENGE_LOG_FILE: '/tmp/challenge.log',
      LOG_LEVEL: 'debug',
    });

    expect(config).toMatchObject({
      proxy: 'http://10.0.0.1:3128',
      headless: false,
      browserArguments: ['--lang=en-US', '--window-size=1280', '800'],
      maxAttempts: 4,
      clickMaxAttempts: 2,
      waitTimeMs: 250,
      cacheTimeoutMs: 60_000,
      maxConcurrentTasks: 8,
      saveDebugScreenshots: true,
      headersOutputPath: '/tmp/headers.txt',
      logging: { mode: 'file', filePath: '/tmp/challenge.log', level: 'debug', prettyPrint: false },
    });
  });

  it('should report the environment section on invalid values', () => {
    expect(() => loadConfigFromEnv({ CHALLENGE_MAX_ATTEMPTS: 'many' })).toThrow(ConfigurationError);
    expect(() => loadConfigFromEnv({ CHALLENGE_LOG_MODE: 'syslog' })).toThrow(
      'Configuration validation failed for environment'
    );
  });

  it('should read a header template', () => {
    const config = loadConfigFromEnv({ CHALLENGE_DEFAULT_HEADERS: 'Accept:text/html;X-Custom: a:b' });

    expect(config.defaultHeaders).toEqual({ accept: 'text/html', 'x-custom': 'a:b' });
  });
});

describe('parseHeaderTemplate', () => {
  it('should skip pairs without a name', () => {
    expect(parseHeaderTemplate('accept:*/*;:orphan;novalue')).toEqual({ accept: '*/*' });
  });

  it('should pass undefined through', () => {
    expect(parseHeaderTemplate(undefined)).toBeUndefined();
  });
});
