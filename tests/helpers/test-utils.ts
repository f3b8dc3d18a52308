/**
 * Test Utilities
 * Common helpers for writing tests
 */

import { nanoid } from 'nanoid';
import { vi } from 'vitest';
import { pino, type Logger } from 'pino';

import type { ServiceContext } from '@/types/context.js';

/**
 * Logger that drops everything; spy on its methods to assert logging
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Create a service context for testing
 */
export function createTestContext(
  overrides?: Partial<ServiceContext>
): ServiceContext {
  return {
    requestId: `req_${nanoid(8)}`,
    logger: createSilentLogger(),
    ...overrides,
  };
}

/**
 * Pin Date to a fixed instant, leaving timers untouched
 */
export function freezeTime(iso: string): Date {
  const now = new Date(iso);
  vi.useFakeTimers({ toFake: ['Date'] });
  vi.setSystemTime(now);
  return now;
}
