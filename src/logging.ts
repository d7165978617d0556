// =============================================================================
// STOCKROOM — Console Logging
//
// Tagged console output ("[Auth] ...") gated by LOG_LEVEL.
// =============================================================================

import { config } from './config';

const LEVELS = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
} as const;

export type LogLevel = keyof typeof LEVELS;

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

/** Console logger whose lines are prefixed with `[tag]`. */
export function createLogger(tag: string, level: string = config.logging.level): Logger {
  const threshold = LEVELS[isLogLevel(level) ? level : 'info'];
  const enabled = (l: Exclude<LogLevel, 'silent'>) => LEVELS[l] >= threshold;
  const prefix = `[${tag}]`;

  return {
    debug: (message, ...meta) => {
      if (enabled('debug')) console.debug(prefix, message, ...meta);
    },
    info: (message, ...meta) => {
      if (enabled('info')) console.log(prefix, message, ...meta);
    },
    warn: (message, ...meta) => {
      if (enabled('warn')) console.warn(prefix, message, ...meta);
    },
    error: (message, ...meta) => {
      if (enabled('error')) console.error(prefix, message, ...meta);
    },
  };
}
