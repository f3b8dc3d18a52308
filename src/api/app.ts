/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as honoLogger } from 'hono/logger';
import type { Logger } from 'pino';

import { createRequestContextMiddleware } from './middleware/request-context.js';
import { createDocsRoutes } from './routes/docs.js';
import { createHealthRoutes } from './routes/health.js';
import { createSubscriptionRoutes } from './routes/subscriptions.js';
import type { SubscriptionService } from '../services/index.js';
import { errorResponse } from './utils/response.js';

/**
 * App configuration
 */
interface AppConfig {
  logger: Logger;
  services: {
    subscriptionService: SubscriptionService;
  };
  requestTimeoutMs: number;
  allowedOrigins?: string[];
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { logger, services, requestTimeoutMs, allowedOrigins } = config;
  const app = new Hono();

  // Global middleware
  app.use(
    '*',
    createRequestContextMiddleware({ logger, requestTimeoutMs })
  );
  app.use(
    '*',
    honoLogger((message: string, ...rest: string[]) => {
      logger.info([message, ...rest].join(' '));
    })
  );
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'X-Request-Id'],
      exposeHeaders: ['X-Request-Id'],
    })
  );

  app.route('/', createDocsRoutes());
  app.route('/api/v1', createHealthRoutes());
  app.route(
    '/api/v1',
    createSubscriptionRoutes({
      subscriptionService: services.subscriptionService,
    })
  );

  // 404 handler
  app.notFound((c) => {
    return errorResponse(
      c,
      { code: 'NOT_FOUND', message: 'Endpoint not found' },
      c.get('requestId')
    );
  });

  // Global error handler
  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');

    return errorResponse(
      c,
      { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
      requestId
    );
  });

  return app;
}
