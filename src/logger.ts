/**
 * Log levels in order of severity: debug < info < warn < error.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger used by the two-pass pipeline. Implementations may forward to any
 * logging backend.
 */
export interface PhasedLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const noop = (): void => {};

/**
 * Logger that discards everything. Used when no logger is configured.
 */
export const silentLogger: PhasedLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Create a logger writing to the console, dropping messages below `minLevel`.
 *
 * @param minLevel - Lowest level that is written.
 * @param namespace - Prefix for each line.
 * @returns Console-backed logger.
 */
export function createConsoleLogger (minLevel: LogLevel = 'info', namespace = 'phased'): PhasedLogger {
  const write = (level: LogLevel) => (message: string, data?: Record<string, unknown>): void => {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
    const line = `[${namespace}] ${level.toUpperCase()} ${message}`;
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    if (data) sink(line, data);
    else sink(line);
  };
  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}
