import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getEnv } from '../config/env.js';

let supabaseInstance: SupabaseClient | null = null;

export function getSupabaseClient(): SupabaseClient {
  if (supabaseInstance) return supabaseInstance;

  const { SUPABASE_URL: url, SUPABASE_SECRET_KEY: key } = getEnv();
  if (!url || !key) {
    throw new Error('Missing SUPABASE_URL or SUPABASE_SECRET_KEY environment variables');
  }

  supabaseInstance = createClient(url, key, {
    auth: { persistSession: false },
  });
  return supabaseInstance;
}
