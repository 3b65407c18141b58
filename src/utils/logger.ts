/**
 * Structured logging
 * Writes to stderr so stdout stays free for the MCP stdio transport
 */

import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  return LOG_LEVELS.find(level => level === envLevel) ?? 'info';
}

export const logger = pino(
  {
    name: 'chain-of-knowledge',
    level: getLogLevel(),
  },
  pino.destination(2)
);

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
