// =============================================================================
// GATEKEEP — Logging
//
// Tagged console output ("[Authz] ..."), filtered by LOG_LEVEL.
// Never pass a bearer token to a logger.
// =============================================================================

import { config, LogLevel } from '../config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export function createLogger(
  component: string,
  level: LogLevel = config.logging.level
): Logger {
  const threshold = LEVEL_ORDER[level];
  const tag = `[${component}]`;
  const enabled = (at: LogLevel) => LEVEL_ORDER[at] >= threshold;

  return {
    debug: (message, ...meta) => {
      if (enabled('debug')) console.debug(tag, message, ...meta);
    },
    info: (message, ...meta) => {
      if (enabled('info')) console.info(tag, message, ...meta);
    },
    warn: (message, ...meta) => {
      if (enabled('warn')) console.warn(tag, message, ...meta);
    },
    error: (message, ...meta) => {
      if (enabled('error')) console.error(tag, message, ...meta);
    },
  };
}
