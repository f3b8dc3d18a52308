/**
 * Logger Configuration
 * Structured JSON logging with pino
 */

import { pino, type Logger } from 'pino';

import type { AppEnv } from './env.js';

/**
 * Keys never written to logs
 */
const REDACT_PATHS = [
  'serviceKey',
  'apiKey',
  'authorization',
  '*.serviceKey',
  '*.apiKey',
  '*.authorization',
  'headers.authorization',
];

export interface LoggerOptions {
  appEnv: AppEnv;
  level: string;
}

/**
 * Create the root application logger.
 * Local development gets pretty printing; dev and prod write JSON lines.
 */
export function createLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    base: { env: options.appEnv },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    transport:
      options.appEnv === 'local'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
  });
}
