import { createClient, type SupabaseClient } from "@supabase/supabase-js";

import { ConfigurationError } from "./errors.ts";

type Env = Record<string, string | undefined>;

/** Service-role client for server-side jobs. No session persistence. */
export function createServiceClient(env: Env = process.env): SupabaseClient {
  const url = env.SUPABASE_URL              ?? "";
  const key = env.SUPABASE_SERVICE_ROLE_KEY ?? "";
  if (!url || !key) {
    throw new ConfigurationError("missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY");
  }
  return createClient(url, key, { auth: { persistSession: false } });
}
