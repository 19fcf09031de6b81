/**
 * Tagged console logging.
 *
 * Messages are prefixed with the module tag (e.g. `[Quaternion] ...`) and
 * filtered by a single process-wide level.
 *
 * @example
 * const log = createLogger('Quaternion');
 * log.debug('slerp fell back to linear interpolation');
 * // -> console.debug('[Quaternion] slerp fell back to linear interpolation')
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Create a logger that prefixes every message with `[tag]`.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  return {
    debug: (message, ...details) => {
      if (isEnabled('debug')) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (isEnabled('info')) console.log(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (isEnabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (isEnabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
