/**
 * Shared Library Exports
 * Infrastructure used by the entry point
 */

export { createSupabaseAdmin } from './supabase.js';
export type { SupabaseAdminOptions } from './supabase.js';
export { createLogger, type LoggerOptions } from './logger.js';
export { parseEnv, APP_ENVS, type AppConfig, type AppEnv, type Env } from './env.js';
