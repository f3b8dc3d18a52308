/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ErrorCode, ServiceContext } from '../types/index.js';

/**
 * Extended Hono context with request-scoped values
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    serviceContext: ServiceContext;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 404 | 500;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ErrorStatus> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  STORAGE_ERROR: 500,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}
