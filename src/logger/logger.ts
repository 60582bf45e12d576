/**
 * Leveled console logger.
 *
 * @module logger/logger
 */

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  trace(message: string): void;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Parse a level name, falling back when the value is missing or unknown.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return level !== 'silent' && LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Create a logger whose lines are prefixed with `[scope]`.
 * The level is read on every call so `setLogLevel` applies to existing loggers.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    trace(message) {
      if (isLevelEnabled('trace')) console.debug(`${prefix} ${message}`);
    },
    debug(message) {
      if (isLevelEnabled('debug')) console.debug(`${prefix} ${message}`);
    },
    info(message) {
      if (isLevelEnabled('info')) console.log(`${prefix} ${message}`);
    },
    warn(message) {
      if (isLevelEnabled('warn')) console.warn(`${prefix} ${message}`);
    },
    error(message) {
      if (isLevelEnabled('error')) console.error(`${prefix} ${message}`);
    },
  };
}
