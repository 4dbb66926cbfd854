/**
 * Supabase client for durable host memory.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { ConfigurationError } from './errors.js';
import type { Env } from './config.js';

export function hasSupabase(env: Env = process.env): boolean {
  return Boolean(env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY);
}

export function getSupabaseClient(env: Env = process.env): SupabaseClient {
  const url = env.SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY;

  if (!url || !key) {
    throw new ConfigurationError('Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY');
  }

  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
