/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export { createApp } from './app.js';
export { createHealthRoutes, API_VERSION } from './routes/health.js';
export { createSubscriptionRoutes } from './routes/subscriptions.js';
export { createDocsRoutes, OPENAPI_DOCUMENT_PATH } from './routes/docs.js';
export { buildOpenApiDocument } from './openapi.js';
export {
  createRequestContextMiddleware,
  REQUEST_ID_HEADER,
} from './middleware/request-context.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
export type { ErrorResponse, ErrorStatus, SuccessResponse } from './types.js';
