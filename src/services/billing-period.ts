/**
 * Billing Period Normalization
 *
 * Callers ask for costs by month ("01-2025" to "03-2025"). The store needs
 * a closed timestamp range, so the start month becomes its first instant
 * and the end month becomes its last whole second. All instants are UTC.
 */

import type { CostPeriod, Result } from '../types/index.js';
import { success, failure } from '../types/index.js';

/**
 * MM-YYYY: two-digit month 01-12, four-digit year
 */
const MONTH_YEAR_PATTERN = /^(0[1-9]|1[0-2])-(\d{4})$/;

export const MONTH_YEAR_FORMAT = 'MM-YYYY';

/**
 * Parse a MM-YYYY string into the first instant of that month.
 * Returns null when the string is not in MM-YYYY form.
 */
export function parseMonthYear(value: string): Date | null {
  const match = MONTH_YEAR_PATTERN.exec(value);
  if (match === null) {
    return null;
  }

  const month = Number(match[1]);
  const year = Number(match[2]);

  // setUTCFullYear keeps years below 100 literal, Date.UTC would not
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, 1);
  return date;
}

/**
 * Last whole second of the month that starts at monthStart
 */
export function lastSecondOfMonth(monthStart: Date): Date {
  const nextMonth = new Date(monthStart.getTime());
  nextMonth.setUTCMonth(nextMonth.getUTCMonth() + 1);
  return new Date(nextMonth.getTime() - 1000);
}

/**
 * Convert a month-granularity range into the closed range
 * [first instant of `from`, last second of `to`].
 *
 * `from` later than `to` is accepted and yields a range no row can fall in.
 */
export function normalizeCostPeriod(
  from: string,
  to: string
): Result<CostPeriod> {
  const fromMonth = parseMonthYear(from);
  if (fromMonth === null) {
    return failure(
      'VALIDATION_ERROR',
      `Invalid from date, expected ${MONTH_YEAR_FORMAT}`,
      { field: 'from', value: from }
    );
  }

  const toMonth = parseMonthYear(to);
  if (toMonth === null) {
    return failure(
      'VALIDATION_ERROR',
      `Invalid to date, expected ${MONTH_YEAR_FORMAT}`,
      { field: 'to', value: to }
    );
  }

  return success({
    from: fromMonth,
    to: lastSecondOfMonth(toMonth),
  });
}
