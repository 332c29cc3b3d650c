/**
 * Logging and metrics hooks
 *
 * Every module takes an injectable Logger and Metrics pair. The defaults
 * write JSON lines to the console and drop metrics.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

function resolveLevel(level?: LogLevel): LogLevel {
  if (level) return level;
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Create a console logger that emits one JSON object per line
 *
 * @param module - Module name recorded on every entry
 * @param level - Minimum level; defaults to LOG_LEVEL or 'info'
 */
export function createLogger(module: string, level?: LogLevel): Logger {
  const threshold = LOG_LEVEL_PRIORITY[resolveLevel(level)];

  const write = (entryLevel: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LOG_LEVEL_PRIORITY[entryLevel] < threshold) {
      return;
    }
    const line = JSON.stringify({
      level: entryLevel,
      module,
      message,
      ...meta,
      timestamp: new Date().toISOString(),
    });
    switch (entryLevel) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.log(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}

/**
 * Default no-op metrics implementation
 */
export const defaultMetrics: Metrics = {
  increment: () => { /* no-op */ },
  gauge: () => { /* no-op */ },
  timing: () => { /* no-op */ },
};
