import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { ConfigError } from "./errors";

/**
 * Service-role client for server-side persistence. Never ship the service key
 * to a browser.
 */
export function supabaseAdmin(env: NodeJS.ProcessEnv = process.env): SupabaseClient {
  const url = env.SUPABASE_URL?.trim();
  const serviceKey = env.SUPABASE_SERVICE_ROLE_KEY?.trim();
  if (!url || !serviceKey) {
    throw new ConfigError(
      "Supabase is not configured",
      "Set SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY"
    );
  }
  return createClient(url, serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
