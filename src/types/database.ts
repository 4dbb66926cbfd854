/**
 * Persisted row types. Mirrors the Supabase `host_profiles` table.
 * Column names use snake_case to match PostgreSQL conventions.
 */

import type { Origin, RiskTier, TurnOutcome } from './models.js';

export interface TurnRecord {
  timestamp: string;
  intent_text: string;
  command_text: string;
  origin: Origin;
  risk_tier: RiskTier;
  outcome: TurnOutcome;
  exit_code: number | null;
  output_excerpt: string;
}

export interface HostProfileRow {
  /** `address:port:user` */
  host_key: string;
  address: string;
  port: number;
  username: string;
  os: string | null;
  kernel: string | null;
  cpu_model: string | null;
  memory_total: string | null;
  /** jsonb array, oldest first. */
  turns: unknown;
  updated_at: string;
}
