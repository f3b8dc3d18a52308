/**
 * Application Wiring Unit Tests
 *
 * Request id propagation, 404 and unhandled error envelopes.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Hono } from 'hono';

import { createApp } from '@/api/app.js';
import { failure, success } from '@/types/index.js';
import type { Failure, ServiceContext } from '@/types/index.js';

import { createSilentLogger } from '../../helpers/test-utils.js';
import {
  createMockSubscriptionService,
  type MockSubscriptionService,
} from '../../mocks/index.js';

describe('createApp', () => {
  let service: MockSubscriptionService;
  let app: Hono;

  beforeEach(() => {
    service = createMockSubscriptionService();
    app = createApp({
      logger: createSilentLogger(),
      services: { subscriptionService: service },
      requestTimeoutMs: 5000,
      allowedOrigins: ['https://app.example.com'],
    });
  });

  // ─────────────────────────────────────────────────────────────
  // REQUEST ID
  // ─────────────────────────────────────────────────────────────

  describe('request id', () => {
    it('should echo a caller supplied X-Request-Id', async () => {
      const res = await app.request('/api/v1/health', {
        headers: { 'X-Request-Id': 'caller-123' },
      });

      expect(res.headers.get('X-Request-Id')).toBe('caller-123');
    });

    it('should generate a request id when none is sent', async () => {
      const res = await app.request('/api/v1/health');

      expect(res.headers.get('X-Request-Id')).toMatch(/^[A-Za-z0-9_-]{21}$/);
    });

    it('should ignore a blank X-Request-Id', async () => {
      const res = await app.request('/api/v1/health', {
        headers: { 'X-Request-Id': '   ' },
      });

      expect(res.headers.get('X-Request-Id')).toMatch(/^[A-Za-z0-9_-]{21}$/);
    });

    it('should hand the same id to the service context', async () => {
      service.listSubscriptions.mockResolvedValue(success([]));

      const res = await app.request('/api/v1/subscriptions', {
        headers: { 'X-Request-Id': 'caller-456' },
      });
      const body: unknown = await res.json();

      expect(service.listSubscriptions.mock.calls[0]?.[0].requestId).toBe(
        'caller-456'
      );
      expect(body).toEqual({ data: [], meta: { requestId: 'caller-456' } });
    });
  });

  // ─────────────────────────────────────────────────────────────
  // CANCELLATION
  // ─────────────────────────────────────────────────────────────

  describe('request signal', () => {
    /**
     * Service call that only settles once its context signal aborts
     */
    function waitForAbort(ctx: ServiceContext) {
      return new Promise<Failure>((resolve) => {
        ctx.signal?.addEventListener(
          'abort',
          () => resolve(failure('STORAGE_ERROR', 'Failed to list subscriptions')),
          { once: true }
        );
      });
    }

    it('should carry a live signal for an ordinary request', async () => {
      service.listSubscriptions.mockResolvedValue(success([]));

      await app.request('/api/v1/subscriptions');

      const ctx = service.listSubscriptions.mock.calls[0]?.[0];
      expect(ctx?.signal?.aborted).toBe(false);
    });

    it('should abort the service signal when the caller has cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      service.listSubscriptions.mockResolvedValue(success([]));

      await app.request(
        new Request('http://localhost/api/v1/subscriptions', {
          signal: controller.signal,
        })
      );

      const ctx = service.listSubscriptions.mock.calls[0]?.[0];
      expect(ctx?.signal?.aborted).toBe(true);
    });

    it('should abort an in-flight service call when the caller goes away', async () => {
      const controller = new AbortController();
      service.listSubscriptions.mockImplementation((ctx) => {
        const settled = waitForAbort(ctx);
        controller.abort();
        return settled;
      });

      const res = await app.request(
        new Request('http://localhost/api/v1/subscriptions', {
          signal: controller.signal,
        })
      );

      expect(res.status).toBe(500);
    });

    it('should abort the service signal once the deadline passes', async () => {
      const shortApp = createApp({
        logger: createSilentLogger(),
        services: { subscriptionService: service },
        requestTimeoutMs: 10,
      });
      service.listSubscriptions.mockImplementation(waitForAbort);

      const res = await shortApp.request('/api/v1/subscriptions');
      const body: unknown = await res.json();

      expect(res.status).toBe(500);
      expect(body).toMatchObject({
        error: { code: 'STORAGE_ERROR', message: 'Failed to list subscriptions' },
      });
      const reason: unknown =
        service.listSubscriptions.mock.calls[0]?.[0].signal?.reason;
      expect(reason).toBeInstanceOf(DOMException);
      if (reason instanceof DOMException) {
        expect(reason.name).toBe('TimeoutError');
      }
    });
  });

  // ─────────────────────────────────────────────────────────────
  // ERROR ENVELOPES
  // ─────────────────────────────────────────────────────────────

  describe('error handling', () => {
    it('should return a NOT_FOUND envelope for unknown routes', async () => {
      const res = await app.request('/api/v2/nothing', {
        headers: { 'X-Request-Id': 'req-404' },
      });
      const body: unknown = await res.json();

      expect(res.status).toBe(404);
      expect(body).toEqual({
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: 'req-404',
        },
      });
    });

    it('should convert a thrown error into INTERNAL_ERROR', async () => {
      const boom = new Error('unexpected');
      service.listSubscriptions.mockRejectedValue(boom);

      const res = await app.request('/api/v1/subscriptions', {
        headers: { 'X-Request-Id': 'req-500' },
      });
      const body: unknown = await res.json();

      expect(res.status).toBe(500);
      expect(body).toEqual({
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId: 'req-500',
        },
      });
    });
  });

  // ─────────────────────────────────────────────────────────────
  // CORS
  // ─────────────────────────────────────────────────────────────

  describe('cors', () => {
    it('should allow configured origins', async () => {
      const res = await app.request('/api/v1/health', {
        headers: { Origin: 'https://app.example.com' },
      });

      expect(res.headers.get('Access-Control-Allow-Origin')).toBe(
        'https://app.example.com'
      );
    });
  });
});
