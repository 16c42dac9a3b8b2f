import { createClient, SupabaseClient } from '@supabase/supabase-js';

let supabaseInstance: SupabaseClient | null = null;

export interface SupabaseSettings {
  url: string;
  serviceRoleKey: string;
}

/**
 * Lazily create the shared service-role client.
 * Returns null when no settings are configured; persistence is then skipped.
 */
export const getSupabase = (settings: SupabaseSettings | null): SupabaseClient | null => {
  if (supabaseInstance) return supabaseInstance;

  if (!settings) {
    console.warn(
      '[Supabase] Configuration missing: SUPABASE_URL or SUPABASE_SERVICE_ROLE not set. ' +
      'Audit replication and crisis notifications will be unavailable.'
    );
    return null;
  }

  supabaseInstance = createClient(settings.url, settings.serviceRoleKey, {
    auth: { persistSession: false }
  });
  return supabaseInstance;
};

export const resetSupabase = (): void => {
  supabaseInstance = null;
};
