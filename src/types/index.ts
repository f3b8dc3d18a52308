/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type { ServiceContext } from './context.js';
export { createServiceContext } from './context.js';
export type {
  Subscription,
  CreateSubscriptionParams,
  UpdateSubscriptionParams,
  TotalCostParams,
  CostPeriod,
} from './subscription.js';
