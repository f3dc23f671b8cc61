/**
 * Logger for r3d-asset-codec
 *
 * Leveled, colored console output with an optional timing wrapper around
 * decode and encode calls. Codecs take a logger through `CodecOptions` and
 * fall back to the shared `logger` below.
 */

/**
 * Log Levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Logger Options Interface
 */
export interface LoggerOptions {
  level?: LogLevel;
  timestamp?: boolean;
  /**
   * Attach elapsed milliseconds to timed operations
   */
  duration?: boolean;
  prefix?: string;
  /**
   * Output sink; defaults to console.log
   */
  sink?: (message: string, payload?: unknown) => void;
}

/**
 * Structured fields passed along with a message
 */
export interface LoggerContext {
  operation?: string | undefined;
  format?: string | undefined;
  version?: number | string | undefined;
  offset?: number | undefined;
  byteLength?: number | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

const LEVELS: Record<LogLevel, { rank: number; label: string; color: string }> = {
  [LogLevel.DEBUG]: { rank: 0, label: 'DEBUG', color: '\x1b[90m' },
  [LogLevel.INFO]: { rank: 1, label: 'INFO', color: '\x1b[36m' },
  [LogLevel.WARN]: { rank: 2, label: 'WARN', color: '\x1b[33m' },
  [LogLevel.ERROR]: { rank: 3, label: 'ERROR', color: '\x1b[31m' },
};

const RESET = '\x1b[0m';

function consoleSink(message: string, payload?: unknown): void {
  if (payload !== undefined) {
    console.log(message, payload);
  } else {
    console.log(message);
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Logger {
  private readonly options: Required<LoggerOptions>;

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level ?? LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      duration: options.duration ?? true,
      prefix: options.prefix ?? 'R3dCodec',
      sink: options.sink ?? consoleSink,
    };
  }

  get level(): LogLevel {
    return this.options.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVELS[level].rank >= LEVELS[this.options.level].rank;
  }

  private write(level: LogLevel, message: string, context?: LoggerContext): void {
    if (!this.isLevelEnabled(level)) return;

    const { label, color } = LEVELS[level];
    // HH:mm:ss.SSS
    const time = this.options.timestamp ? ` @ ${new Date().toISOString().substring(11, 23)}` : '';
    this.options.sink(`${color}${this.options.prefix} [${label}]${time} ${message}${RESET}`, context);
  }

  debug(message: string, context?: LoggerContext): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.write(LogLevel.ERROR, message, context);
  }

  private finish(operation: string, start: number, context: LoggerContext): void {
    this.debug(`Completed ${operation}`, {
      operation,
      ...(this.options.duration ? { duration: Math.round((performance.now() - start) * 100) / 100 } : {}),
      ...context
    });
  }

  /**
   * Runs `fn` and logs its outcome at debug level
   */
  withTimingSync<T>(operation: string, fn: () => T, context?: LoggerContext): T {
    const start = performance.now();
    try {
      const result = fn();
      this.finish(operation, start, { ...context, success: true });
      return result;
    } catch (error) {
      this.finish(operation, start, { ...context, success: false, error: describeError(error) });
      throw error;
    }
  }

  /**
   * Async variant of `withTimingSync`
   */
  async withTiming<T>(operation: string, fn: () => Promise<T>, context?: LoggerContext): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      this.finish(operation, start, { ...context, success: true });
      return result;
    } catch (error) {
      this.finish(operation, start, { ...context, success: false, error: describeError(error) });
      throw error;
    }
  }

  /**
   * Log configuration
   */
  logConfig(config: Record<string, unknown>, context?: LoggerContext): void {
    this.debug('Configuration loaded', { config, ...context });
  }
}

/**
 * Default logger instance; codecs fall back to it when no logger is passed
 */
export const logger = new Logger({ level: LogLevel.WARN });

/**
 * Create logger with custom options
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}
