/**
 * Subscription Domain Types
 *
 * A subscription records a user paying a recurring price for a named
 * service over a span of time. Prices are integer minor currency units.
 */

/**
 * Subscription entity
 */
export interface Subscription {
  /** Assigned by the store on insert */
  id: string;
  serviceName: string;
  servicePrice: number;
  userId: string;
  startedAt: Date;
  /** null while the subscription is still active */
  endedAt: Date | null;
}

/**
 * Parameters for creating a subscription
 */
export interface CreateSubscriptionParams {
  serviceName: string;
  servicePrice: number;
  userId: string;
  endedAt?: Date | null;
}

/**
 * Parameters for updating a subscription.
 * The full mutable field set is required; id comes from the caller's path.
 */
export interface UpdateSubscriptionParams {
  userId: string;
  serviceName: string;
  servicePrice: number;
  endedAt: Date | null;
}

/**
 * Parameters for a total cost query, months as MM-YYYY
 */
export interface TotalCostParams {
  userId: string;
  serviceName: string;
  from: string;
  to: string;
}

/**
 * Closed timestamp range a total cost is computed over
 */
export interface CostPeriod {
  from: Date;
  to: Date;
}
