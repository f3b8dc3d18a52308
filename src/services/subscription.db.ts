/**
 * SubscriptionService Database Adapter
 * Implements SubscriptionServiceDb interface using Supabase
 *
 * Table and total cost function: supabase/migrations/001_subscriptions.sql
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type { Subscription } from '../types/index.js';

import type { SubscriptionServiceDb } from './subscription.service.js';

const TABLE = 'subscriptions';
const COLUMNS =
  'id, service_name, service_price, user_id, started_at, ended_at';
const TOTAL_COST_FUNCTION = 'subscription_total_cost';

/**
 * Database row shape, checked on every read
 */
const subscriptionRowSchema = z.object({
  id: z.string(),
  service_name: z.string(),
  service_price: z.number().int(),
  user_id: z.string(),
  started_at: z.string(),
  ended_at: z.string().nullable(),
});

type SubscriptionRow = z.infer<typeof subscriptionRowSchema>;

const totalCostSchema = z.number().int();

/**
 * PostgREST error code for `.single()` matching zero rows
 */
const NO_ROWS_CODE = 'PGRST116';

/**
 * Thrown for every failed store call, including aborted requests
 */
export class SubscriptionStoreError extends Error {
  readonly operation: string;
  readonly code: string | null;

  constructor(
    operation: string,
    message: string,
    options: { code?: string; cause?: unknown } = {}
  ) {
    super(`${operation}: ${message}`, { cause: options.cause });
    this.name = 'SubscriptionStoreError';
    this.operation = operation;
    this.code = options.code ?? null;
  }
}

function storeError(
  operation: string,
  error: { code: string; message: string }
): SubscriptionStoreError {
  return new SubscriptionStoreError(operation, error.message, {
    code: error.code,
    cause: error,
  });
}

/**
 * Map database row to Subscription entity
 */
function mapRowToSubscription(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    serviceName: row.service_name,
    servicePrice: row.service_price,
    userId: row.user_id,
    startedAt: new Date(row.started_at),
    endedAt: row.ended_at !== null ? new Date(row.ended_at) : null,
  };
}

function parseRows(operation: string, data: unknown): Subscription[] {
  const parsed = z.array(subscriptionRowSchema).safeParse(data);
  if (!parsed.success) {
    throw new SubscriptionStoreError(operation, 'Unexpected row shape', {
      cause: parsed.error,
    });
  }
  return parsed.data.map(mapRowToSubscription);
}

function parseRow(operation: string, data: unknown): Subscription {
  const parsed = subscriptionRowSchema.safeParse(data);
  if (!parsed.success) {
    throw new SubscriptionStoreError(operation, 'Unexpected row shape', {
      cause: parsed.error,
    });
  }
  return mapRowToSubscription(parsed.data);
}

/**
 * Attach the request signal so an expired deadline aborts the HTTP call
 */
function withSignal<Q extends { abortSignal: (signal: AbortSignal) => Q }>(
  query: Q,
  signal: AbortSignal | undefined
): Q {
  return signal !== undefined ? query.abortSignal(signal) : query;
}

/**
 * Create SubscriptionServiceDb implementation using Supabase
 */
export function createSubscriptionServiceDb(
  supabase: SupabaseClient
): SubscriptionServiceDb {
  return {
    async createSubscription(
      params: Omit<Subscription, 'id'>,
      signal?: AbortSignal
    ): Promise<Subscription> {
      const { data, error } = await withSignal(
        supabase
          .from(TABLE)
          .insert({
            service_name: params.serviceName,
            service_price: params.servicePrice,
            user_id: params.userId,
            started_at: params.startedAt.toISOString(),
            ended_at: params.endedAt?.toISOString() ?? null,
          })
          .select(COLUMNS),
        signal
      ).single();

      if (error !== null) {
        throw storeError('createSubscription', error);
      }

      return parseRow('createSubscription', data);
    },

    async updateSubscription(
      params: {
        subscriptionId: string;
        userId: string;
        serviceName: string;
        servicePrice: number;
        endedAt: Date | null;
      },
      signal?: AbortSignal
    ): Promise<void> {
      const { error } = await withSignal(
        supabase
          .from(TABLE)
          .update({
            service_name: params.serviceName,
            service_price: params.servicePrice,
            ended_at: params.endedAt?.toISOString() ?? null,
          })
          .eq('id', params.subscriptionId)
          .eq('user_id', params.userId),
        signal
      );

      if (error !== null) {
        throw storeError('updateSubscription', error);
      }
    },

    async deleteSubscription(
      subscriptionId: string,
      userId: string,
      signal?: AbortSignal
    ): Promise<void> {
      const { error } = await withSignal(
        supabase
          .from(TABLE)
          .delete()
          .eq('id', subscriptionId)
          .eq('user_id', userId),
        signal
      );

      if (error !== null) {
        throw storeError('deleteSubscription', error);
      }
    },

    async listSubscriptions(signal?: AbortSignal): Promise<Subscription[]> {
      const { data, error } = await withSignal(
        supabase
          .from(TABLE)
          .select(COLUMNS)
          .order('started_at', { ascending: true })
          .order('id', { ascending: true }),
        signal
      );

      if (error !== null) {
        throw storeError('listSubscriptions', error);
      }

      return parseRows('listSubscriptions', data);
    },

    async listSubscriptionsByUser(
      userId: string,
      signal?: AbortSignal
    ): Promise<Subscription[]> {
      const { data, error } = await withSignal(
        supabase
          .from(TABLE)
          .select(COLUMNS)
          .eq('user_id', userId)
          .order('started_at', { ascending: true })
          .order('id', { ascending: true }),
        signal
      );

      if (error !== null) {
        throw storeError('listSubscriptionsByUser', error);
      }

      return parseRows('listSubscriptionsByUser', data);
    },

    async getSubscription(
      subscriptionId: string,
      signal?: AbortSignal
    ): Promise<Subscription | null> {
      const { data, error } = await withSignal(
        supabase.from(TABLE).select(COLUMNS).eq('id', subscriptionId),
        signal
      ).single();

      if (error !== null) {
        if (error.code === NO_ROWS_CODE) {
          return null; // Not found
        }
        throw storeError('getSubscription', error);
      }

      return parseRow('getSubscription', data);
    },

    /**
     * Sum runs in Postgres so PostgREST's max-rows cap cannot truncate it
     */
    async getTotalCost(
      params: {
        userId: string;
        serviceName: string;
        period: { from: Date; to: Date };
      },
      signal?: AbortSignal
    ): Promise<number> {
      const { data, error } = await withSignal(
        supabase.rpc(TOTAL_COST_FUNCTION, {
          p_user_id: params.userId,
          p_service_name: params.serviceName,
          p_from: params.period.from.toISOString(),
          p_to: params.period.to.toISOString(),
        }),
        signal
      );

      if (error !== null) {
        throw storeError('getTotalCost', error);
      }

      const parsed = totalCostSchema.safeParse(data);
      if (!parsed.success) {
        throw new SubscriptionStoreError(
          'getTotalCost',
          'Unexpected total cost value',
          { cause: parsed.error }
        );
      }
      return parsed.data;
    },
  };
}
