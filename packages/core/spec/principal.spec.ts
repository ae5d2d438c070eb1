import { describe, expect, it } from 'vitest';

import { normalizePrincipal } from '#principal';

describe('fn:normalizePrincipal', () => {
  it('should trim and lower-case an email address', () => {
    expect(normalizePrincipal('  Alice@Example.COM ')).toBe('alice@example.com');
  });

  it('should keep the case of other identifiers', () => {
    expect(normalizePrincipal(' AbC-user ')).toBe('AbC-user');
    expect(normalizePrincipal('abc-user')).not.toBe(normalizePrincipal('AbC-user'));
  });

  it('should reject blank identifiers', () => {
    expect(() => normalizePrincipal('   ')).toThrow(
      new TypeError('principal identifier must not be empty'),
    );
  });
});
