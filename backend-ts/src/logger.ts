/**
 * Centralized logging utility.
 * Everything goes to stderr so that CLI answers printed on stdout stay pipeable.
 */

import { Console } from 'console';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const output = new Console({ stdout: process.stderr, stderr: process.stderr });

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Narrow an arbitrary string (usually from the environment) to a log level.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isLogLevel(normalized) ? normalized : fallback;
}

// config.ts resets this once .env is loaded
let currentLogLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

/**
 * Set the current log level.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

function shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLogLevel];
}

/**
 * Logger interface matching console API.
 */
export const logger = {
  debug: (...args: unknown[]) => {
    if (shouldLog('debug')) {
      output.debug('[DEBUG]', ...args);
    }
  },
  info: (...args: unknown[]) => {
    if (shouldLog('info')) {
      output.info('[INFO]', ...args);
    }
  },
  warn: (...args: unknown[]) => {
    if (shouldLog('warn')) {
      output.warn('[WARN]', ...args);
    }
  },
  error: (...args: unknown[]) => {
    if (shouldLog('error')) {
      output.error('[ERROR]', ...args);
    }
  },
};
