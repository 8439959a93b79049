import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { readSupabaseConfig, validateSupabaseConfig, type SupabaseConfig } from './supabase-config';

let supabaseClient: SupabaseClient | null = null;

/**
 * Get the Supabase client instance.
 * Returns null if Supabase is not configured (offline-only mode).
 */
export function getSupabase(config: SupabaseConfig = readSupabaseConfig()): SupabaseClient | null {
  if (!validateSupabaseConfig(config)) {
    return null;
  }

  if (!supabaseClient) {
    supabaseClient = createClient(config.url, config.anonKey, {
      auth: {
        // Sessions are owned by the host process
        persistSession: false,
        autoRefreshToken: false,
      },
      global: config.accessToken
        ? { headers: { Authorization: `Bearer ${config.accessToken}` } }
        : undefined,
    });
  }

  return supabaseClient;
}

/**
 * Check if Supabase is available (configured).
 */
export function isSupabaseConfigured(config: SupabaseConfig = readSupabaseConfig()): boolean {
  return validateSupabaseConfig(config);
}
