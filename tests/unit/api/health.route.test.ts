/**
 * Health Route Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { API_VERSION, createHealthRoutes } from '@/api/routes/health.js';

import { freezeTime } from '../../helpers/test-utils.js';

describe('GET /health', () => {
  it('should report ok with the current time and version', async () => {
    freezeTime('2025-05-01T12:00:00.000Z');
    const app = createHealthRoutes();

    const res = await app.request('/health');
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toEqual({
      status: 'ok',
      timestamp: '2025-05-01T12:00:00.000Z',
      uptimeSeconds: 0,
      version: API_VERSION,
    });
  });

  it('should count whole seconds since the routes were created', async () => {
    freezeTime('2025-05-01T12:00:00.000Z');
    const app = createHealthRoutes();
    freezeTime('2025-05-01T12:01:30.900Z');

    const res = await app.request('/health');
    const body: unknown = await res.json();

    expect(body).toMatchObject({ uptimeSeconds: 90 });
  });
});
