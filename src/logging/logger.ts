/**
 * Process-wide pino logger.
 *
 * Logs go to stderr: in stdio mode stdout carries MCP JSON-RPC frames.
 */

import { pino, destination, type Logger } from 'pino';

export type { Logger };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'file-nexus',
      level: options.level ?? 'info',
    },
    destination(2),
  );
}

/**
 * Logger that drops everything. Used by tests and as the default for
 * components created without one.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
