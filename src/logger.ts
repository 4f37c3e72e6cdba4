/**
 * Level-gated console logger.
 *
 * Everything goes to stderr: under the stdio transport stdout carries
 * the MCP protocol stream.
 */

import type { LogLevel } from './config.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(level: LogLevel): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (messageLevel: LogLevel, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[messageLevel] < threshold) return;
    console.error(`[${new Date().toISOString()}] ${messageLevel.toUpperCase()} ${message}`, ...details);
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
  };
}

/** Logger that drops everything, for tests and embedding */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
