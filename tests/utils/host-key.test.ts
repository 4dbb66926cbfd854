import { describe, it, expect } from 'vitest';
import { formatHostKey, parseHostKey } from '../../src/utils/host-key.js';

describe('formatHostKey', () => {
  it('should join address, port and user', () => {
    expect(formatHostKey({ address: '10.0.0.5', port: 22, user: 'root' })).toBe('10.0.0.5:22:root');
  });
});

describe('parseHostKey', () => {
  it('should invert formatHostKey', () => {
    expect(parseHostKey('web-1.internal:2222:deploy')).toEqual({
      address: 'web-1.internal',
      port: 2222,
      user: 'deploy',
    });
  });

  it('should keep colons inside an IPv6 address', () => {
    expect(parseHostKey('fe80::1:22:ops')).toEqual({ address: 'fe80::1', port: 22, user: 'ops' });
  });

  it.each(['', 'web-1', 'web-1:22', ':22:ops', 'web-1:ssh:ops', 'web-1:0:ops', 'web-1:70000:ops', 'web-1:22:'])(
    'should reject "%s"',
    (value) => {
      expect(parseHostKey(value)).toBeNull();
    }
  );
});
