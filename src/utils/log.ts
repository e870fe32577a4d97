/**
 * Structured logging (pino)
 */

import pino from 'pino';

export function resolveLogLevel(): string {
  return process.env.LOG_LEVEL || 'info';
}

const root = pino({
  level: resolveLogLevel(),
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

export function createLogger(module: string): Logger {
  return root.child({ module });
}
