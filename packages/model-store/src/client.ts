import { createClient, SupabaseClient } from "@supabase/supabase-js";

let client: SupabaseClient | null = null;

export interface SupabaseEnv {
  SUPABASE_URL?: string;
  SUPABASE_SERVICE_ROLE_KEY?: string;
  SUPABASE_ANON_KEY?: string;
}

/**
 * Server-side only. Reads model artifacts from Storage, so the anon key is enough when
 * the bucket allows it; the service role key wins when both are set.
 */
export function getSupabase(env: SupabaseEnv = process.env): SupabaseClient | null {
  if (!client) {
    const url = env.SUPABASE_URL;
    const key = env.SUPABASE_SERVICE_ROLE_KEY ?? env.SUPABASE_ANON_KEY;
    if (!url || !key) return null;
    client = createClient(url, key, { auth: { persistSession: false } });
  }
  return client;
}
