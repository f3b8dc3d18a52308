/**
 * Subscription Routes
 * CRUD endpoints plus the period total cost query
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type {
  CreateSubscriptionParams,
  Result,
  ServiceContext,
  Subscription,
  TotalCostParams,
  UpdateSubscriptionParams,
} from '../../types/index.js';
import { errorResponse, successResponse } from '../utils/response.js';

/**
 * Subscription service interface (minimal for routes)
 */
interface SubscriptionServiceDep {
  createSubscription: (
    ctx: ServiceContext,
    params: CreateSubscriptionParams
  ) => Promise<Result<Subscription>>;
  updateSubscription: (
    ctx: ServiceContext,
    subscriptionId: string,
    params: UpdateSubscriptionParams
  ) => Promise<Result<void>>;
  deleteSubscription: (
    ctx: ServiceContext,
    subscriptionId: string,
    userId: string
  ) => Promise<Result<void>>;
  listSubscriptions: (ctx: ServiceContext) => Promise<Result<Subscription[]>>;
  listUserSubscriptions: (
    ctx: ServiceContext,
    userId: string
  ) => Promise<Result<Subscription[]>>;
  getSubscription: (
    ctx: ServiceContext,
    subscriptionId: string
  ) => Promise<Result<Subscription>>;
  getTotalCost: (
    ctx: ServiceContext,
    params: TotalCostParams
  ) => Promise<Result<number>>;
}

interface SubscriptionRoutesDeps {
  subscriptionService: SubscriptionServiceDep;
}

const endedAtSchema = z.string().datetime({ offset: true }).nullable();

const subscriptionBodySchema = z.object({
  serviceName: z
    .string({ required_error: 'serviceName is required' })
    .min(1, 'serviceName is required'),
  servicePrice: z.number({
    required_error: 'servicePrice is required',
    invalid_type_error: 'servicePrice must be a number',
  }),
  userId: z
    .string({ required_error: 'userId is required' })
    .min(1, 'userId is required'),
  endedAt: endedAtSchema.optional(),
});

/**
 * Helper to get request ID from context
 */
function getRequestId(c: Context): string {
  return c.get('requestId');
}

/**
 * Format date to ISO string
 */
function formatDate(date: Date): string {
  return date.toISOString();
}

function formatSubscription(subscription: Subscription) {
  return {
    id: subscription.id,
    serviceName: subscription.serviceName,
    servicePrice: subscription.servicePrice,
    userId: subscription.userId,
    startedAt: formatDate(subscription.startedAt),
    endedAt:
      subscription.endedAt !== null ? formatDate(subscription.endedAt) : null,
  };
}

function parseEndedAt(value: string | null | undefined): Date | null {
  return value !== undefined && value !== null ? new Date(value) : null;
}

/**
 * Read a JSON body, treating malformed JSON as an empty object
 * so the schema reports it as a validation error
 */
async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return {};
  }
}

function validationError(c: Context, message: string): Response {
  return errorResponse(
    c,
    { code: 'VALIDATION_ERROR', message },
    getRequestId(c)
  );
}

/**
 * Create subscription routes
 */
export function createSubscriptionRoutes(deps: SubscriptionRoutesDeps): Hono {
  const { subscriptionService } = deps;
  const app = new Hono();

  /**
   * POST /subscriptions
   * Create a subscription starting now
   */
  app.post('/subscriptions', async (c) => {
    const requestId = getRequestId(c);

    const validation = subscriptionBodySchema.safeParse(
      await readJsonBody(c)
    );
    if (!validation.success) {
      return validationError(
        c,
        validation.error.issues[0]?.message ?? 'Invalid subscription data'
      );
    }

    const body = validation.data;
    const result = await subscriptionService.createSubscription(
      c.get('serviceContext'),
      {
        serviceName: body.serviceName,
        servicePrice: body.servicePrice,
        userId: body.userId,
        endedAt: parseEndedAt(body.endedAt),
      }
    );

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatSubscription(result.data), requestId, 201);
  });

  /**
   * GET /subscriptions
   * List all subscriptions, or one user's when userId is given
   */
  app.get('/subscriptions', async (c) => {
    const requestId = getRequestId(c);
    const userId = c.req.query('userId');
    const ctx = c.get('serviceContext');

    const result =
      userId !== undefined && userId !== ''
        ? await subscriptionService.listUserSubscriptions(ctx, userId)
        : await subscriptionService.listSubscriptions(ctx);

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data.map(formatSubscription), requestId);
  });

  /**
   * GET /subscriptions/total
   * Total price for a user's service between two MM-YYYY months
   */
  app.get('/subscriptions/total', async (c) => {
    const requestId = getRequestId(c);

    const result = await subscriptionService.getTotalCost(
      c.get('serviceContext'),
      {
        userId: c.req.query('userId') ?? '',
        serviceName: c.req.query('serviceName') ?? '',
        from: c.req.query('from') ?? '',
        to: c.req.query('to') ?? '',
      }
    );

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, { totalCost: result.data }, requestId);
  });

  /**
   * GET /subscriptions/:id
   * Get a single subscription
   */
  app.get('/subscriptions/:id', async (c) => {
    const requestId = getRequestId(c);

    const result = await subscriptionService.getSubscription(
      c.get('serviceContext'),
      c.req.param('id')
    );

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatSubscription(result.data), requestId);
  });

  /**
   * PUT /subscriptions/:id
   * Replace name, price and end date of a user's subscription
   */
  app.put('/subscriptions/:id', async (c) => {
    const requestId = getRequestId(c);
    const subscriptionId = c.req.param('id');

    const validation = subscriptionBodySchema.safeParse(
      await readJsonBody(c)
    );
    if (!validation.success) {
      return validationError(
        c,
        validation.error.issues[0]?.message ?? 'Invalid subscription data'
      );
    }

    const body = validation.data;
    const result = await subscriptionService.updateSubscription(
      c.get('serviceContext'),
      subscriptionId,
      {
        userId: body.userId,
        serviceName: body.serviceName,
        servicePrice: body.servicePrice,
        endedAt: parseEndedAt(body.endedAt),
      }
    );

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, { id: subscriptionId }, requestId);
  });

  /**
   * DELETE /subscriptions/:id?userId=
   * Delete a subscription owned by userId
   */
  app.delete('/subscriptions/:id', async (c) => {
    const requestId = getRequestId(c);

    const result = await subscriptionService.deleteSubscription(
      c.get('serviceContext'),
      c.req.param('id'),
      c.req.query('userId') ?? ''
    );

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return c.body(null, 204);
  });

  return app;
}
