/**
 * Health Route
 * Public endpoint for liveness checks
 */

import { Hono } from 'hono';

export const API_VERSION = 'v1';

/**
 * Create health check routes
 */
export function createHealthRoutes(): Hono {
  const app = new Hono();
  const startedAt = Date.now();

  /**
   * GET /health
   * Does not touch the store
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      version: API_VERSION,
    });
  });

  return app;
}
