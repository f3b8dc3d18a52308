/**
 * Supabase Client Configuration
 * Provides the service client used by the database adapters
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseAdminOptions {
  /** Replaces the global fetch for every PostgREST call */
  fetch?: typeof fetch;
}

/**
 * Create a Supabase client authenticated with the service key.
 * Sessions are disabled; the API never acts as an end user.
 */
export function createSupabaseAdmin(
  url: string,
  serviceKey: string,
  options: SupabaseAdminOptions = {}
): SupabaseClient {
  return createClient(url, serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
    ...(options.fetch !== undefined && { global: { fetch: options.fetch } }),
  });
}
