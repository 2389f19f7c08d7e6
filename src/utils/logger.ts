/**
 * Logging for the scheduler
 *
 * Every level goes to stderr: stdout is reserved for the MCP stdio transport.
 */

import { getConfig, type LogLevel } from './config.js';

/**
 * Logger interface accepted by stores, services and oracles
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Create a console logger for a scope, filtered by the configured level
 */
export function createLogger(scope: string, level?: LogLevel): Logger {
  const threshold = LEVEL_RANK[level ?? getConfig().server.logLevel];
  const prefix = `[semester-scheduler] [${scope}]`;

  const write = (lvl: LogLevel) => (message: string, ...args: unknown[]) => {
    if (LEVEL_RANK[lvl] < threshold) return;
    console.error(`${prefix} ${lvl.toUpperCase()} ${message}`, ...args);
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

/**
 * Logger that discards everything (tests, library use)
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
