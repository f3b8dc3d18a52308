/**
 * Environment Configuration Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { parseEnv } from '@/lib/env.js';

const baseEnv = {
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_KEY: 'test-secret',
};

describe('parseEnv', () => {
  it('should apply defaults for optional variables', () => {
    expect(parseEnv(baseEnv)).toEqual({
      appEnv: 'local',
      logLevel: 'debug',
      port: 8080,
      supabase: {
        url: 'http://localhost:54321',
        serviceKey: 'test-secret',
      },
      http: {
        requestTimeoutMs: 5000,
        shutdownTimeoutMs: 10000,
        allowedOrigins: ['http://localhost:3000'],
      },
    });
  });

  it('should default the log level to info in prod', () => {
    const config = parseEnv({ ...baseEnv, APP_ENV: 'prod' });

    expect(config.appEnv).toBe('prod');
    expect(config.logLevel).toBe('info');
  });

  it('should prefer an explicit log level', () => {
    const config = parseEnv({ ...baseEnv, APP_ENV: 'prod', LOG_LEVEL: 'warn' });

    expect(config.logLevel).toBe('warn');
  });

  it('should coerce numeric variables', () => {
    const config = parseEnv({
      ...baseEnv,
      PORT: '3001',
      REQUEST_TIMEOUT_MS: '250',
      SHUTDOWN_TIMEOUT_MS: '1500',
    });

    expect(config.port).toBe(3001);
    expect(config.http.requestTimeoutMs).toBe(250);
    expect(config.http.shutdownTimeoutMs).toBe(1500);
  });

  it('should split and trim allowed origins', () => {
    const config = parseEnv({
      ...baseEnv,
      ALLOWED_ORIGINS: 'https://a.example.com, https://b.example.com,,',
    });

    expect(config.http.allowedOrigins).toEqual([
      'https://a.example.com',
      'https://b.example.com',
    ]);
  });

  it('should list every missing required variable', () => {
    expect(() => parseEnv({})).toThrow(
      /^Invalid environment variables: SUPABASE_URL: Required; SUPABASE_SERVICE_KEY: Required$/
    );
  });

  it('should reject an unknown APP_ENV', () => {
    expect(() => parseEnv({ ...baseEnv, APP_ENV: 'staging' })).toThrow(
      /APP_ENV/
    );
  });

  it('should reject a non-numeric port', () => {
    expect(() => parseEnv({ ...baseEnv, PORT: 'http' })).toThrow(/PORT/);
  });
});
