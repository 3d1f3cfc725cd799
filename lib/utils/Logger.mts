/**
 * Component-prefixed console logger
 *
 * Every line is written as `[Component] message`. The level is process-wide
 * and set once from configuration.
 */

import type { LogLevel } from '../types.mjs';

export type { LogLevel };

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Create a logger for one component
 *
 * @example
 * const logger = createLogger('HubSession');
 * logger.info('connected'); // [HubSession] connected
 */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
