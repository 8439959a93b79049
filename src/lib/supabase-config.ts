// Supabase configuration from environment variables
export interface SupabaseConfig {
  url: string;
  anonKey: string;
  accessToken: string | null;
}

export function readSupabaseConfig(env: NodeJS.ProcessEnv = process.env): SupabaseConfig {
  return {
    url: env.SUPABASE_URL ?? '',
    anonKey: env.SUPABASE_ANON_KEY ?? '',
    accessToken: env.SUPABASE_ACCESS_TOKEN ?? null,
  };
}

// Validate configuration
export function validateSupabaseConfig(config: SupabaseConfig): boolean {
  if (!config.url || config.url === 'https://your-project.supabase.co') {
    console.warn('[Supabase] URL not configured. Cloud sync will be disabled.');
    return false;
  }
  if (!config.anonKey || config.anonKey === 'your-anon-key') {
    console.warn('[Supabase] Anon key not configured. Cloud sync will be disabled.');
    return false;
  }
  return true;
}
