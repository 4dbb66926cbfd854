/**
 * Conversion between HostProfile models and host_profiles rows.
 * Rows come back from the database as untyped JSON and are validated here.
 */

import type { HostProfileRow, TurnRecord } from '../types/database.js';
import {
  ORIGINS,
  RISK_TIERS,
  TURN_OUTCOMES,
  type HostFacts,
  type HostProfile,
  type Turn,
} from '../types/models.js';
import { formatHostKey } from '../utils/host-key.js';
import { conforms } from '../validation/schema.js';

const rowSchema = {
  host_key: { type: 'string', required: true },
  address: { type: 'string', required: true },
  port: { type: 'number', required: true, min: 1, max: 65535 },
  username: { type: 'string', required: true },
  os: { type: 'string', required: false },
  kernel: { type: 'string', required: false },
  cpu_model: { type: 'string', required: false },
  memory_total: { type: 'string', required: false },
  turns: { type: 'array', required: true },
  updated_at: { type: 'string', required: false },
} as const;

const turnSchema = {
  timestamp: { type: 'string', required: true },
  intent_text: { type: 'string', required: true },
  command_text: { type: 'string', required: true },
  origin: { type: 'string', required: true, enum: ORIGINS },
  risk_tier: { type: 'string', required: true, enum: RISK_TIERS },
  outcome: { type: 'string', required: true, enum: TURN_OUTCOMES },
  exit_code: { type: 'number', required: false },
  output_excerpt: { type: 'string', required: false },
} as const;

export function turnToRecord(turn: Turn): TurnRecord {
  return {
    timestamp: turn.timestamp.toISOString(),
    intent_text: turn.intentText,
    command_text: turn.commandText,
    origin: turn.origin,
    risk_tier: turn.riskTier,
    outcome: turn.outcome,
    exit_code: turn.exitCode,
    output_excerpt: turn.outputExcerpt,
  };
}

export function recordToTurn(value: unknown, index: number): Turn {
  const errors: string[] = [];
  if (!conforms(value, turnSchema, errors)) {
    throw new Error(`Corrupt turn record at index ${index}: ${errors.join('; ')}`);
  }
  return Object.freeze({
    timestamp: new Date(value.timestamp),
    intentText: value.intent_text,
    commandText: value.command_text,
    origin: value.origin,
    riskTier: value.risk_tier,
    outcome: value.outcome,
    exitCode: value.exit_code ?? null,
    outputExcerpt: value.output_excerpt ?? '',
  });
}

export function profileToRow(profile: HostProfile): HostProfileRow {
  return {
    host_key: formatHostKey(profile.hostKey),
    address: profile.hostKey.address,
    port: profile.hostKey.port,
    username: profile.hostKey.user,
    os: profile.facts?.os ?? null,
    kernel: profile.facts?.kernel ?? null,
    cpu_model: profile.facts?.cpuModel ?? null,
    memory_total: profile.facts?.memoryTotal ?? null,
    turns: profile.turns.map(turnToRecord),
    updated_at: (profile.updatedAt ?? new Date()).toISOString(),
  };
}

export function rowToProfile(row: unknown): HostProfile {
  const errors: string[] = [];
  if (!conforms(row, rowSchema, errors)) {
    throw new Error(`Corrupt host profile row: ${errors.join('; ')}`);
  }

  const facts: HostFacts | null =
    row.os != null && row.kernel != null && row.cpu_model != null && row.memory_total != null
      ? { os: row.os, kernel: row.kernel, cpuModel: row.cpu_model, memoryTotal: row.memory_total }
      : null;

  return {
    hostKey: { address: row.address, port: row.port, user: row.username },
    facts,
    turns: row.turns.map(recordToTurn),
    updatedAt: row.updated_at ? new Date(row.updated_at) : null,
  };
}
