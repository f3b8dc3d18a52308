/**
 * Service Context Definition
 *
 * Every service method receives a context object carrying the
 * request metadata it logs with and the signal that bounds its store call.
 */

import type { Logger } from 'pino';

export interface ServiceContext {
  /** Request ID for tracing */
  requestId: string;

  /** Logger already bound to the request */
  logger: Logger;

  /** Aborts the in-flight store call on cancellation or deadline */
  signal?: AbortSignal;
}

/**
 * Bind a context to a request id
 */
export function createServiceContext(
  logger: Logger,
  requestId: string,
  signal?: AbortSignal
): ServiceContext {
  return {
    requestId,
    logger: logger.child({ requestId }),
    ...(signal !== undefined && { signal }),
  };
}
