/**
 * API Docs Routes
 * OpenAPI document and Swagger UI, outside the versioned prefix
 */

import { swaggerUI } from '@hono/swagger-ui';
import { Hono } from 'hono';

import { buildOpenApiDocument } from '../openapi.js';

export const OPENAPI_DOCUMENT_PATH = '/swagger/openapi.json';

export function createDocsRoutes(): Hono {
  const app = new Hono();
  const document = buildOpenApiDocument();

  /**
   * GET /swagger/openapi.json
   */
  app.get(OPENAPI_DOCUMENT_PATH, (c) => c.json(document));

  /**
   * GET /swagger
   * Swagger UI; the page loads its assets from a CDN
   */
  app.get('/swagger', swaggerUI({ url: OPENAPI_DOCUMENT_PATH }));

  return app;
}
