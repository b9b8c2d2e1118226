/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Three output modes: disabled, console (stderr), file (stderr + log file)
 * - Component-based child loggers
 * - Redaction of cookie and credential fields, since header sets carry
 *   session cookies
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LoggingMode = 'disabled' | 'console' | 'file';

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  url?: string;
  cacheKey?: string;
  attempt?: number;
  status?: string;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  mode: LoggingMode;
  level: LogLevel;
  prettyPrint: boolean;
  /** Only used in file mode */
  filePath: string;
}

const DEFAULT_CONFIG: LoggerConfig = {
  mode: 'console',
  level: 'info',
  prettyPrint: false,
  filePath: 'challenge-headers.log',
};

/**
 * Paths to redact from logs. Uses Pino's path syntax (wildcards with *)
 *
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  '*.authorization',
  '*.cookie',
  '*.Cookie',
  '*.set-cookie',
  'headers.cookie',
  'headers.authorization',
  '*.password',
  '*.proxy',
  'cookies',
  '*.cookies',
];

type FileDestination = ReturnType<typeof pino.destination>;

/** The open log file in file mode, ended before it is replaced */
let fileDestination: FileDestination | null = null;
const closingDestinations = new Set<Promise<void>>();

function openFileDestination(filePath: string): FileDestination {
  fileDestination = pino.destination({ dest: filePath, mkdir: true, append: true, sync: false });
  return fileDestination;
}

/**
 * End the current log file; buffered entries are written before the
 * descriptor is closed
 */
function retireFileDestination(): void {
  const destination = fileDestination;
  if (!destination) {
    return;
  }
  fileDestination = null;

  const closed = new Promise<void>((resolve) => {
    destination.once('close', () => resolve());
    destination.once('error', (error: Error) => {
      process.stderr.write(`Log file could not be closed: ${error.message}\n`);
      resolve();
    });
  });
  closingDestinations.add(closed);
  void closed.then(() => closingDestinations.delete(closed));
  destination.end();
}

/**
 * Create the base Pino logger instance
 */
function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.mode === 'disabled' ? 'silent' : config.level,
    base: {
      pid: process.pid,
      service: 'challenge-headers',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (config.mode === 'disabled') {
    return pino(options);
  }

  if (config.mode === 'file') {
    // multistream filters by its own level, which defaults to info
    return pino(options, pino.multistream([
      { level: 'debug', stream: process.stderr },
      { level: 'debug', stream: openFileDestination(config.filePath) },
    ]));
  }

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    });
  }

  return pino(options, process.stderr);
}

let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (useful for testing or runtime changes).
 * A log file opened by an earlier call is ended first.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  retireFileDestination();
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

/**
 * Flush and close the log file, if any, and go back to the default
 * console output. Resolves once every file is closed.
 */
export async function closeLogger(): Promise<void> {
  retireFileDestination();
  baseLogger = createBaseLogger();
  await Promise.all([...closingDestinations]);
}

/**
 * Get the base logger
 */
export function getLogger(): PinoLogger {
  return baseLogger;
}

/**
 * Component-specific logger wrapper
 *
 * Uses a getter to always access the current baseLogger, allowing
 * reconfiguration at runtime via configureLogger().
 */
export class Logger {
  private _logger: PinoLogger | null = null;
  private component: string;

  constructor(component: string, parentLogger?: PinoLogger) {
    this.component = component;
    if (parentLogger) {
      this._logger = parentLogger.child({ component });
    }
  }

  private get logger(): PinoLogger {
    if (this._logger) {
      return this._logger;
    }
    return baseLogger.child({ component: this.component });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.component);
    childLogger._logger = this.logger.child(context);
    return childLogger;
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  /**
   * Accepts unknown type for error since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error) {
      const err = context.error instanceof Error
        ? {
            message: context.error.message,
            name: context.error.name,
            stack: context.error.stack,
          }
        : { message: String(context.error) };

      this.logger.error({ ...context, err }, message);
    } else {
      this.logger.error(context || {}, message);
    }
  }

  /**
   * Log with timing information
   */
  timed(message: string, startTime: number, context?: LogContext): void {
    const durationMs = Date.now() - startTime;
    this.info(message, { ...context, durationMs });
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  pipeline: new Logger('AcquisitionPipeline'),
  solver: new Logger('ChallengeSolver'),
  browser: new Logger('BrowserSession'),
  limiter: new Logger('ConcurrencyLimiter'),
  retry: new Logger('Retry'),
  config: new Logger('Config'),

  create: (component: string) => new Logger(component),
};

export default logger;
