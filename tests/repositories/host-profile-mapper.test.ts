import { describe, it, expect } from 'vitest';
import {
  profileToRow,
  recordToTurn,
  rowToProfile,
  turnToRecord,
} from '../../src/repositories/host-profile-mapper.js';
import type { HostProfile, Turn } from '../../src/types/models.js';

const turn: Turn = {
  timestamp: new Date('2026-03-01T08:00:00.000Z'),
  intentText: '查看磁盘空间',
  commandText: 'df -h',
  origin: 'LocalMatch',
  riskTier: 'Safe',
  outcome: 'succeeded',
  exitCode: 0,
  outputExcerpt: 'Filesystem Size Used',
};

const profile: HostProfile = {
  hostKey: { address: '10.0.0.5', port: 22, user: 'ops' },
  facts: { os: 'Ubuntu 22.04', kernel: '5.15.0', cpuModel: 'Xeon', memoryTotal: '16G' },
  turns: [turn],
  updatedAt: new Date('2026-03-01T08:00:01.000Z'),
};

describe('host profile mapping', () => {
  it('should map a turn to snake_case columns', () => {
    expect(turnToRecord(turn)).toEqual({
      timestamp: '2026-03-01T08:00:00.000Z',
      intent_text: '查看磁盘空间',
      command_text: 'df -h',
      origin: 'LocalMatch',
      risk_tier: 'Safe',
      outcome: 'succeeded',
      exit_code: 0,
      output_excerpt: 'Filesystem Size Used',
    });
  });

  it('should map a profile to a row', () => {
    const row = profileToRow(profile);

    expect(row.host_key).toBe('10.0.0.5:22:ops');
    expect(row.username).toBe('ops');
    expect(row.cpu_model).toBe('Xeon');
    expect(row.updated_at).toBe('2026-03-01T08:00:01.000Z');
  });

  it('should read back what it wrote', () => {
    expect(rowToProfile(profileToRow(profile))).toEqual(profile);
  });

  it('should leave facts empty unless every column is set', () => {
    const row = { ...profileToRow(profile), kernel: null };
    expect(rowToProfile(row).facts).toBeNull();
  });

  it('should default a missing exit code and excerpt', () => {
    const restored = recordToTurn(
      {
        timestamp: '2026-03-01T08:00:00.000Z',
        intent_text: 'reboot',
        command_text: 'reboot',
        origin: 'Direct',
        risk_tier: 'Destructive',
        outcome: 'rejected',
      },
      0
    );

    expect(restored.exitCode).toBeNull();
    expect(restored.outputExcerpt).toBe('');
  });

  it('should reject a corrupt turn with its index', () => {
    const row = { ...profileToRow(profile), turns: [turnToRecord(turn), { ...turnToRecord(turn), origin: 'Guess' }] };

    expect(() => rowToProfile(row)).toThrow(
      'Corrupt turn record at index 1: origin must be one of: LocalMatch, AIGenerated, Direct'
    );
  });

  it('should reject a corrupt row', () => {
    const { port: _port, ...row } = profileToRow(profile);

    expect(() => rowToProfile(row)).toThrow('Corrupt host profile row: port is required');
  });
});
