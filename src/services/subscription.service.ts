/**
 * SubscriptionService Implementation
 *
 * SCOPE: Subscription lifecycle and period cost aggregation
 * NOT IN SCOPE: Charging, taxes, currency conversion
 *
 * GUARDRAILS:
 * - Input is validated before any store call
 * - startedAt is always the processing time of the create call
 * - Delete is scoped by subscription id AND owner id in one statement
 * - Each operation issues exactly one store call, no retries
 *
 * Dependencies: SubscriptionServiceDb
 */

import { z } from 'zod';

import type {
  CostPeriod,
  CreateSubscriptionParams,
  Failure,
  Result,
  ServiceContext,
  Subscription,
  TotalCostParams,
  UpdateSubscriptionParams,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

import { normalizeCostPeriod } from './billing-period.js';

/**
 * Database abstraction interface for SubscriptionService.
 * Implementations throw on any store failure, including an aborted signal.
 */
export interface SubscriptionServiceDb {
  createSubscription: (
    params: Omit<Subscription, 'id'>,
    signal?: AbortSignal
  ) => Promise<Subscription>;
  /** Zero matched rows is not an error */
  updateSubscription: (
    params: UpdateSubscriptionParams & { subscriptionId: string },
    signal?: AbortSignal
  ) => Promise<void>;
  /** Zero matched rows is not an error */
  deleteSubscription: (
    subscriptionId: string,
    userId: string,
    signal?: AbortSignal
  ) => Promise<void>;
  listSubscriptions: (signal?: AbortSignal) => Promise<Subscription[]>;
  listSubscriptionsByUser: (
    userId: string,
    signal?: AbortSignal
  ) => Promise<Subscription[]>;
  getSubscription: (
    subscriptionId: string,
    signal?: AbortSignal
  ) => Promise<Subscription | null>;
  /** Sum of prices with startedAt in the closed period, 0 when none match */
  getTotalCost: (
    params: { userId: string; serviceName: string; period: CostPeriod },
    signal?: AbortSignal
  ) => Promise<number>;
}

/**
 * SubscriptionService interface
 */
export interface SubscriptionService {
  createSubscription(
    ctx: ServiceContext,
    params: CreateSubscriptionParams
  ): Promise<Result<Subscription>>;
  updateSubscription(
    ctx: ServiceContext,
    subscriptionId: string,
    params: UpdateSubscriptionParams
  ): Promise<Result<void>>;
  deleteSubscription(
    ctx: ServiceContext,
    subscriptionId: string,
    userId: string
  ): Promise<Result<void>>;
  listSubscriptions(ctx: ServiceContext): Promise<Result<Subscription[]>>;
  listUserSubscriptions(
    ctx: ServiceContext,
    userId: string
  ): Promise<Result<Subscription[]>>;
  getSubscription(
    ctx: ServiceContext,
    subscriptionId: string
  ): Promise<Result<Subscription>>;
  getTotalCost(
    ctx: ServiceContext,
    params: TotalCostParams
  ): Promise<Result<number>>;
}

const uuidSchema = z.string().uuid();

/**
 * service_price is an int4 column
 */
export const MAX_SERVICE_PRICE = 2147483647;

/**
 * Create SubscriptionService instance
 */
export function createSubscriptionService(deps: {
  db: SubscriptionServiceDb;
}): SubscriptionService {
  const { db } = deps;

  // ─────────────────────────────────────────────────────────────
  // HELPER FUNCTIONS
  // ─────────────────────────────────────────────────────────────

  function validatePrice(servicePrice: number): Failure | null {
    if (!Number.isInteger(servicePrice)) {
      return failure(
        'VALIDATION_ERROR',
        'Service price must be a whole number of minor units',
        { field: 'servicePrice', value: servicePrice }
      );
    }
    if (servicePrice < 0) {
      return failure('VALIDATION_ERROR', 'Service price cannot be negative', {
        field: 'servicePrice',
        value: servicePrice,
      });
    }
    if (servicePrice > MAX_SERVICE_PRICE) {
      return failure(
        'VALIDATION_ERROR',
        `Service price cannot exceed ${MAX_SERVICE_PRICE}`,
        { field: 'servicePrice', value: servicePrice }
      );
    }
    return null;
  }

  function validateId(field: string, value: string): Failure | null {
    if (!uuidSchema.safeParse(value).success) {
      return failure('VALIDATION_ERROR', `Invalid ${field}, expected a UUID`, {
        field,
        value,
      });
    }
    return null;
  }

  function rejectInput(
    ctx: ServiceContext,
    op: string,
    result: Failure
  ): Failure {
    ctx.logger.warn(
      { op, details: result.error.details },
      `Validation failed: ${result.error.message}`
    );
    return result;
  }

  /**
   * Run a single store call. Any thrown error is logged with the
   * operation context and reported as an opaque STORAGE_ERROR.
   */
  async function runStore<T>(
    ctx: ServiceContext,
    op: string,
    message: string,
    bindings: Record<string, unknown>,
    call: () => Promise<T>
  ): Promise<Result<T>> {
    try {
      return success(await call());
    } catch (err) {
      ctx.logger.error({ op, err, ...bindings }, message);
      return failure('STORAGE_ERROR', message);
    }
  }

  // ─────────────────────────────────────────────────────────────
  // SERVICE IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  return {
    async createSubscription(
      ctx: ServiceContext,
      params: CreateSubscriptionParams
    ): Promise<Result<Subscription>> {
      const op = 'subscriptions.create';

      const invalid =
        validatePrice(params.servicePrice) ??
        validateId('userId', params.userId);
      if (invalid !== null) {
        return rejectInput(ctx, op, invalid);
      }

      const result = await runStore(
        ctx,
        op,
        'Failed to create subscription',
        { userId: params.userId, serviceName: params.serviceName },
        () =>
          db.createSubscription(
            {
              serviceName: params.serviceName,
              servicePrice: params.servicePrice,
              userId: params.userId,
              startedAt: new Date(),
              endedAt: params.endedAt ?? null,
            },
            ctx.signal
          )
      );

      if (result.success) {
        ctx.logger.info(
          { op, subscriptionId: result.data.id },
          'Subscription created'
        );
      }
      return result;
    },

    async updateSubscription(
      ctx: ServiceContext,
      subscriptionId: string,
      params: UpdateSubscriptionParams
    ): Promise<Result<void>> {
      const op = 'subscriptions.update';

      const invalid =
        validatePrice(params.servicePrice) ??
        validateId('subscriptionId', subscriptionId) ??
        validateId('userId', params.userId);
      if (invalid !== null) {
        return rejectInput(ctx, op, invalid);
      }

      return runStore(
        ctx,
        op,
        'Failed to update subscription',
        { subscriptionId, userId: params.userId },
        () =>
          db.updateSubscription(
            {
              subscriptionId,
              userId: params.userId,
              serviceName: params.serviceName,
              servicePrice: params.servicePrice,
              endedAt: params.endedAt,
            },
            ctx.signal
          )
      );
    },

    async deleteSubscription(
      ctx: ServiceContext,
      subscriptionId: string,
      userId: string
    ): Promise<Result<void>> {
      const op = 'subscriptions.delete';

      const invalid =
        validateId('subscriptionId', subscriptionId) ??
        validateId('userId', userId);
      if (invalid !== null) {
        return rejectInput(ctx, op, invalid);
      }

      return runStore(
        ctx,
        op,
        'Failed to delete subscription',
        { subscriptionId, userId },
        () => db.deleteSubscription(subscriptionId, userId, ctx.signal)
      );
    },

    async listSubscriptions(
      ctx: ServiceContext
    ): Promise<Result<Subscription[]>> {
      return runStore(
        ctx,
        'subscriptions.list',
        'Failed to list subscriptions',
        {},
        () => db.listSubscriptions(ctx.signal)
      );
    },

    async listUserSubscriptions(
      ctx: ServiceContext,
      userId: string
    ): Promise<Result<Subscription[]>> {
      const op = 'subscriptions.listByUser';

      const invalid = validateId('userId', userId);
      if (invalid !== null) {
        return rejectInput(ctx, op, invalid);
      }

      return runStore(
        ctx,
        op,
        'Failed to list subscriptions',
        { userId },
        () => db.listSubscriptionsByUser(userId, ctx.signal)
      );
    },

    async getSubscription(
      ctx: ServiceContext,
      subscriptionId: string
    ): Promise<Result<Subscription>> {
      const op = 'subscriptions.get';

      const invalid = validateId('subscriptionId', subscriptionId);
      if (invalid !== null) {
        return rejectInput(ctx, op, invalid);
      }

      const result = await runStore(
        ctx,
        op,
        'Failed to get subscription',
        { subscriptionId },
        () => db.getSubscription(subscriptionId, ctx.signal)
      );
      if (!result.success) {
        return result;
      }

      if (result.data === null) {
        return failure(
          'NOT_FOUND',
          `Subscription not found: ${subscriptionId}`
        );
      }
      return success(result.data);
    },

    async getTotalCost(
      ctx: ServiceContext,
      params: TotalCostParams
    ): Promise<Result<number>> {
      const op = 'subscriptions.totalCost';
      const log = ctx.logger.child({
        op,
        userId: params.userId,
        serviceName: params.serviceName,
      });

      const missing = (['userId', 'serviceName', 'from', 'to'] as const).filter(
        (key) => params[key] === ''
      );
      if (missing.length > 0) {
        return rejectInput(
          ctx,
          op,
          failure(
            'VALIDATION_ERROR',
            `Missing required parameters: ${missing.join(', ')}`,
            { missing }
          )
        );
      }

      const invalidUser = validateId('userId', params.userId);
      if (invalidUser !== null) {
        return rejectInput(ctx, op, invalidUser);
      }

      const period = normalizeCostPeriod(params.from, params.to);
      if (!period.success) {
        return rejectInput(ctx, op, period);
      }
      const { from, to } = period.data;

      const result = await runStore(
        ctx,
        op,
        'Failed to calculate total cost',
        { userId: params.userId, serviceName: params.serviceName },
        () =>
          db.getTotalCost(
            {
              userId: params.userId,
              serviceName: params.serviceName,
              period: { from, to },
            },
            ctx.signal
          )
      );

      if (result.success) {
        log.info(
          {
            from: from.toISOString(),
            to: to.toISOString(),
            totalCost: result.data,
          },
          'Total cost calculated'
        );
      }
      return result;
    },
  };
}
