/**
 * Console logger with a level filter.
 *
 * Lines look like `[modelgate] [orchestrator] message`.
 */

import type { LogLevel } from '../types/index.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[currentLevel];
}

export function createLogger(component: string): Logger {
  const prefix = `[modelgate] [${component}]`;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.log(`${prefix} ${message}`, ...details);
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
