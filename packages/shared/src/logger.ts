// Tagged console logger, filtered by LOG_LEVEL

import { logLevelFrom, type LogLevel } from './config.js';

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Create a logger that prefixes every line with `[tag]`.
 *
 * The level is read from LOG_LEVEL on first use unless given explicitly.
 * No other variable is looked at, so logging never fails on config.
 */
export function createLogger(tag: string, level?: LogLevel): Logger {
  let threshold: number | null = level ? SEVERITY[level] : null;

  const enabled = (wanted: Exclude<LogLevel, 'silent'>): boolean => {
    if (threshold === null) {
      threshold = SEVERITY[logLevelFrom(process.env)];
    }
    return SEVERITY[wanted] >= threshold;
  };

  const prefix = `[${tag}]`;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
  };
}
