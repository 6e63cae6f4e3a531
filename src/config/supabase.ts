/**
 * Supabase Client Configuration
 * Provides the singleton used by the outcome log, or null when Supabase is not configured.
 */

import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY } from "./env.js";

/**
 * Supabase client singleton with service role key.
 * Null when SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY is missing; recording is then disabled.
 */
export const supabase: SupabaseClient | null =
  SUPABASE_URL && SUPABASE_SERVICE_ROLE_KEY
    ? createClient(SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, {
        auth: {
          autoRefreshToken: false,
          persistSession: false,
        },
      })
    : null;
