/**
 * Log levels
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface
 */
export interface Logger {
  trace(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger format
 */
export type LogFormat = 'pretty' | 'json';

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default 'info'
   */
  level?: LogLevel;

  /**
   * Output format
   * @default 'pretty'
   */
  format?: LogFormat;

  /**
   * Custom prefix for all log messages
   * @default '[sequence]'
   */
  prefix?: string;

  /**
   * Whether to include timestamps
   * @default true
   */
  timestamp?: boolean;
}

type ConsoleFn = (...args: unknown[]) => void;

// 64 and 128-bit sequence values are bigints, which JSON.stringify rejects
const encodeBigInt = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value;

/**
 * Create a logger with the specified configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', format: 'json' });
 * logger.debug('Sequence exhausted', { width: 'u8', last: 255 });
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const { level = 'info', format = 'pretty', prefix = '[sequence]', timestamp = true } = config;

  const levels: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];
  const minLevelIndex = levels.indexOf(level);

  const shouldLog = (logLevel: LogLevel): boolean => {
    return levels.indexOf(logLevel) >= minLevelIndex;
  };

  const formatJSON = (logLevel: LogLevel, message: string, args: unknown[]): string => {
    return JSON.stringify({
      timestamp: timestamp ? new Date().toISOString() : undefined,
      level: logLevel,
      message,
      data: args.length > 0 ? args : undefined,
    }, encodeBigInt);
  };

  const formatPretty = (logLevel: LogLevel, message: string): string => {
    const parts: string[] = [];

    if (timestamp) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(prefix);
    parts.push(`[${logLevel.toUpperCase()}]`);
    parts.push(message);

    return parts.join(' ');
  };

  const log = (logLevel: LogLevel, consoleFn: ConsoleFn, message: string, args: unknown[]): void => {
    if (!shouldLog(logLevel)) {
      return;
    }

    if (format === 'json') {
      consoleFn(formatJSON(logLevel, message, args));
    } else {
      consoleFn(formatPretty(logLevel, message), ...args);
    }
  };

  return {
    trace: (message: string, ...args: unknown[]) => {
      log('trace', console.log, message, args);
    },

    debug: (message: string, ...args: unknown[]) => {
      log('debug', console.log, message, args);
    },

    info: (message: string, ...args: unknown[]) => {
      log('info', console.log, message, args);
    },

    warn: (message: string, ...args: unknown[]) => {
      log('warn', console.warn, message, args);
    },

    error: (message: string, ...args: unknown[]) => {
      log('error', console.error, message, args);
    },
  };
}

/**
 * No-op logger that does nothing
 * Useful for disabling logging
 */
export const noopLogger: Logger = {
  trace: () => {},
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Default logger instance with info level and pretty format
 */
export const defaultLogger = createLogger();
