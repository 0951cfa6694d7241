/**
 * Console logging with a component prefix, gated by level.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel);
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(prefix, message, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.log(prefix, message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(prefix, message, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(prefix, message, ...args);
    },
  };
}
