/**
 * Root logger construction.
 *
 * Components never create loggers of their own; they take one and derive
 * a child tagged with their component name.
 */

import pino from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

export interface CreateLoggerOptions {
  /** Minimum level (default: info) */
  level?: LevelWithSilent;
  /** File descriptor to write to (default: 2, stderr) */
  fd?: number;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino(
    {
      name: 's3pi',
      level: options.level ?? 'info',
      base: null,
    },
    pino.destination({ fd: options.fd ?? 2, sync: true })
  );
}
