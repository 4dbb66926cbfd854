import { describe, it, expect } from 'vitest';
import { conforms, isRecord, validateFields } from '../../src/validation/schema.js';

const schema = {
  command: { type: 'string', required: true, maxLength: 10 },
  tier: { type: 'string', required: false, enum: ['Safe', 'Sensitive'] },
  port: { type: 'number', required: false, min: 1, max: 65535 },
  dryRun: { type: 'boolean', required: false },
  args: { type: 'array', required: false },
  meta: { type: 'object', required: false },
} as const;

describe('isRecord', () => {
  it('should accept plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});

describe('validateFields', () => {
  it('should pass a valid record', () => {
    expect(validateFields({ command: 'df -h', tier: 'Safe', port: 22, dryRun: false, args: [], meta: {} }, schema)).toEqual([]);
  });

  it('should treat null optional fields as absent', () => {
    expect(validateFields({ command: 'uptime', tier: null, port: null }, schema)).toEqual([]);
  });

  it('should report missing required fields', () => {
    expect(validateFields({ command: null }, schema)).toEqual(['command is required']);
  });

  it('should report type errors once per field', () => {
    expect(
      validateFields({ command: 7, port: '22', dryRun: 'yes', args: {}, meta: [] }, schema)
    ).toEqual([
      'command must be a string',
      'port must be a number',
      'dryRun must be a boolean',
      'args must be an array',
      'meta must be an object',
    ]);
  });

  it('should check constraints', () => {
    expect(validateFields({ command: 'systemctl restart', tier: 'Destructive', port: 0 }, schema)).toEqual([
      'command must be 10 characters or less',
      'tier must be one of: Safe, Sensitive',
      'port must be at least 1',
    ]);
    expect(validateFields({ command: 'ls', port: 70000 }, schema)).toEqual(['port must be at most 65535']);
  });

  it('should reject NaN as a number', () => {
    expect(validateFields({ command: 'ls', port: Number.NaN }, schema)).toEqual(['port must be a number']);
  });
});

describe('conforms', () => {
  it('should narrow a matching value', () => {
    const value: unknown = { command: 'uptime', tier: 'Sensitive' };

    if (!conforms(value, schema)) throw new Error('expected value to conform');
    expect(value.command.toUpperCase()).toBe('UPTIME');
    expect(value.tier).toBe('Sensitive');
  });

  it('should collect errors for a non-object', () => {
    const errors: string[] = [];
    expect(conforms('df -h', schema, errors)).toBe(false);
    expect(errors).toEqual(['value must be an object']);
  });

  it('should append field errors to the given list', () => {
    const errors = ['earlier'];
    expect(conforms({}, schema, errors)).toBe(false);
    expect(errors).toEqual(['earlier', 'command is required']);
  });
});
