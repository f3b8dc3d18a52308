/**
 * Request Context Middleware
 * Builds the ServiceContext every route hands to the services
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';

import { createServiceContext } from '../../types/index.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';

interface RequestContextMiddlewareDeps {
  logger: Logger;
  /** Deadline for the store call made while serving the request */
  requestTimeoutMs: number;
}

/**
 * Reuse the caller's request id when it sends one
 */
function resolveRequestId(c: Context): string {
  const incoming = c.req.header(REQUEST_ID_HEADER)?.trim();
  if (incoming !== undefined && incoming !== '') {
    return incoming;
  }
  return nanoid();
}

export function createRequestContextMiddleware(
  deps: RequestContextMiddlewareDeps
) {
  const { logger, requestTimeoutMs } = deps;

  return async function requestContextMiddleware(c: Context, next: Next) {
    const requestId = resolveRequestId(c);

    c.set('requestId', requestId);
    // Aborts on client disconnect or when the deadline passes
    const signal = AbortSignal.any([
      c.req.raw.signal,
      AbortSignal.timeout(requestTimeoutMs),
    ]);

    c.set('serviceContext', createServiceContext(logger, requestId, signal));
    c.header(REQUEST_ID_HEADER, requestId);

    await next();
  };
}
