/**
 * Application Entry Point
 *
 * Wires together config, logger, store and services, then starts the
 * Hono application and handles shutdown signals.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import { createLogger, createSupabaseAdmin, parseEnv } from './lib/index.js';
import type { AppConfig } from './lib/index.js';
import {
  createSubscriptionService,
  createSubscriptionServiceDb,
} from './services/index.js';

// Validate environment
let config: AppConfig;
try {
  config = parseEnv(process.env);
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}

const logger = createLogger({ appEnv: config.appEnv, level: config.logLevel });

// Wire database adapter and service
const supabase = createSupabaseAdmin(
  config.supabase.url,
  config.supabase.serviceKey
);
const subscriptionDb = createSubscriptionServiceDb(supabase);
const subscriptionService = createSubscriptionService({ db: subscriptionDb });

const app = createApp({
  logger,
  services: { subscriptionService },
  requestTimeoutMs: config.http.requestTimeoutMs,
  allowedOrigins: config.http.allowedOrigins,
});

// ─── Start Server ────────────────────────────────────────────────────

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(
    { port: info.port, env: config.appEnv },
    `Server listening on port ${info.port}`
  );
});

// ─── Graceful Shutdown ───────────────────────────────────────────────

let isShuttingDown = false;

function gracefulShutdown(signal: NodeJS.Signals): void {
  if (isShuttingDown) {
    logger.warn({ signal }, 'Shutdown already in progress, ignoring');
    return;
  }
  isShuttingDown = true;

  logger.info({ signal }, 'Graceful shutdown initiated');

  const forceExit = setTimeout(() => {
    logger.error(
      { timeoutMs: config.http.shutdownTimeoutMs },
      'Server did not close in time, exiting'
    );
    process.exit(1);
  }, config.http.shutdownTimeoutMs);
  forceExit.unref();

  server.close((err) => {
    if (err !== undefined) {
      logger.error({ err }, 'Error while closing HTTP server');
      process.exit(1);
    }
    logger.info('Graceful shutdown complete');
    process.exit(0);
  });
}

process.on('SIGTERM', gracefulShutdown);
process.on('SIGINT', gracefulShutdown);
