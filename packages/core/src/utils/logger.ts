// packages/core/src/utils/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Derive a logger that tags every line with `[scope]`. */
  child(scope: string): Logger;
}

/**
 * Leveled console logger. Lines look like `[2024-01-05T10:00:00.000Z] WARN: [store] message`.
 * Everything goes to stderr so stdout stays free for command output.
 */
export function createLogger(level: LogLevel = 'info', scope?: string): Logger {
  const threshold = LOG_LEVELS[level];

  function log(msgLevel: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] < threshold) return;
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] ${msgLevel.toUpperCase()}:`;
    const text = scope ? `[${scope}] ${message}` : message;
    if (args.length > 0) {
      console.error(prefix, text, ...args);
    } else {
      console.error(prefix, text);
    }
  }

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
    child: (childScope) => createLogger(level, scope ? `${scope}:${childScope}` : childScope),
  };
}

/** A logger that drops everything; the default when a caller passes none. */
export function createSilentLogger(): Logger {
  const noop = (): void => {};
  const silent: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => silent,
  };
  return silent;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}
