/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database.
 * All business logic lives here.
 */

// SubscriptionService
export type {
  SubscriptionService,
  SubscriptionServiceDb,
} from './subscription.service.js';
export {
  createSubscriptionService,
  MAX_SERVICE_PRICE,
} from './subscription.service.js';
export {
  createSubscriptionServiceDb,
  SubscriptionStoreError,
} from './subscription.db.js';

// Billing periods
export {
  normalizeCostPeriod,
  parseMonthYear,
  lastSecondOfMonth,
  MONTH_YEAR_FORMAT,
} from './billing-period.js';
