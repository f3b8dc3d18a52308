/**
 * Environment Configuration
 * Validates process environment into a typed config object
 */

import { z } from 'zod';

export const APP_ENVS = ['local', 'dev', 'prod'] as const;

export type AppEnv = (typeof APP_ENVS)[number];

const envSchema = z.object({
  APP_ENV: z.enum(APP_ENVS).default('local'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace'])
    .optional(),
  PORT: z.coerce.number().int().positive().default(8080),

  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1),

  // ─── HTTP server ──────────────────────────────────────────────
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Application config derived from the environment
 */
export interface AppConfig {
  appEnv: AppEnv;
  logLevel: string;
  port: number;
  supabase: {
    url: string;
    serviceKey: string;
  };
  http: {
    requestTimeoutMs: number;
    shutdownTimeoutMs: number;
    allowedOrigins: string[];
  };
}

/**
 * Parse and validate environment variables.
 * Throws with every failing variable listed.
 */
export function parseEnv(
  source: Record<string, string | undefined>
): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    const problems = Object.entries(fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment variables: ${problems}`);
  }

  const env = parsed.data;
  return {
    appEnv: env.APP_ENV,
    logLevel: env.LOG_LEVEL ?? (env.APP_ENV === 'prod' ? 'info' : 'debug'),
    port: env.PORT,
    supabase: {
      url: env.SUPABASE_URL,
      serviceKey: env.SUPABASE_SERVICE_KEY,
    },
    http: {
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
      shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
      allowedOrigins: env.ALLOWED_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin !== ''),
    },
  };
}
