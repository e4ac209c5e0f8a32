/**
 * @fileoverview Leveled console logger shared by the kprint packages.
 *
 * Messages below the current level are dropped. Every line carries a
 * `[kprint]` prefix so diagnostics stay distinguishable from printed
 * resources on a shared terminal.
 *
 * @module @kprint/core/utils/logger
 *
 * @example
 * ```typescript
 * import { logger, setLogLevel } from '@kprint/core';
 *
 * setLogLevel('debug');
 * logger.debug('Registered handler', { kind: 'Pod' });
 * logger.warn('Unable to add print handler');
 * ```
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const PREFIX = '[kprint]';

const severity: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = 'info';

/**
 * Set the global log level.
 *
 * @param level - Lowest level that is written from now on
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Get the current log level.
 *
 * @returns The level set last, 'info' until changed
 */
export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Check whether a string names a log level.
 *
 * @param value - Candidate, typically from a config file or flag
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Whether messages at `level` pass the current threshold.
 */
function enabled(level: LogLevel): boolean {
  return severity[level] >= severity[currentLevel];
}

/**
 * Logger with one method per level. Info goes to stdout, everything else
 * to the matching console channel.
 */
export const logger = {
  /**
   * Write a debug line, e.g. handler registrations.
   *
   * @param message - Text after the `DEBUG:` marker
   * @param args - Extra values handed to console.debug
   */
  debug: (message: string, ...args: unknown[]) => {
    if (enabled('debug')) {
      console.debug(`${PREFIX} DEBUG: ${message}`, ...args);
    }
  },

  /**
   * Write an informational line to stdout.
   *
   * @param message - Text after the prefix
   * @param args - Extra values handed to console.log
   */
  info: (message: string, ...args: unknown[]) => {
    if (enabled('info')) {
      console.log(`${PREFIX} ${message}`, ...args);
    }
  },

  /**
   * Write a warning, e.g. a rejected print handler.
   *
   * @param message - Text after the `WARN:` marker
   * @param args - Extra values handed to console.warn
   */
  warn: (message: string, ...args: unknown[]) => {
    if (enabled('warn')) {
      console.warn(`${PREFIX} WARN: ${message}`, ...args);
    }
  },

  /**
   * Write an error line.
   *
   * @param message - Text after the `ERROR:` marker
   * @param args - Extra values handed to console.error
   */
  error: (message: string, ...args: unknown[]) => {
    if (enabled('error')) {
      console.error(`${PREFIX} ERROR: ${message}`, ...args);
    }
  },
};
