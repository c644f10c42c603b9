/**
 * Tagged logger — structured logging with the owning service's name.
 *
 * Usage:
 *   const log = createLogger('CaptureService');
 *   log.info('Monitoring started');
 *   log.warn('Clipboard read failed', err);
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVEL_ORDER;
}

/** Global log level: starts from CLIPKEEP_LOG_LEVEL, adjusted at runtime from config */
const envLevel = process.env.CLIPKEEP_LOG_LEVEL;
let globalLogLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

/**
 * Create a tagged logger for a specific service/module.
 *
 * @param tag - Service/module name (e.g. 'HistoryStore', 'Enrichment')
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  const shouldLog = (level: LogLevel): boolean => {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[globalLogLevel];
  };

  const stamp = (): string => new Date().toISOString();

  return {
    debug(message: string, ...args: unknown[]) {
      if (shouldLog('debug')) {
        console.debug(stamp(), prefix, message, ...args);
      }
    },
    info(message: string, ...args: unknown[]) {
      if (shouldLog('info')) {
        console.log(stamp(), prefix, message, ...args);
      }
    },
    warn(message: string, ...args: unknown[]) {
      if (shouldLog('warn')) {
        console.warn(stamp(), prefix, message, ...args);
      }
    },
    error(message: string, ...args: unknown[]) {
      if (shouldLog('error')) {
        console.error(stamp(), prefix, message, ...args);
      }
    },
  };
}
