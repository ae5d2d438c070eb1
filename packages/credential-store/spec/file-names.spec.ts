import { describe, expect, it } from 'vitest';

import { fileNameToPrincipal, principalToFileStem } from '#file-names';

describe('fn:principalToFileStem', () => {
  it('should escape characters outside the safe set', () => {
    expect(principalToFileStem('Alice@Example.com')).toBe(
      'alice%40example.com',
    );
  });

  it('should keep subjects that differ only in case apart', () => {
    expect(principalToFileStem('AbC')).toBe('%41b%43');
    expect(principalToFileStem('abc')).toBe('abc');
  });

  it('should escape path separators', () => {
    expect(principalToFileStem('../etc/passwd')).toBe('..%2Fetc%2Fpasswd');
  });

  it('should escape multi-byte characters byte by byte', () => {
    expect(principalToFileStem('zoë')).toBe('zo%C3%AB');
  });
});

describe('fn:fileNameToPrincipal', () => {
  it('should reverse the escaping', () => {
    expect(
      fileNameToPrincipal('alice%40example.com.credentials.json', '.credentials.json'),
    ).toBe('alice@example.com');
  });

  it('should skip entries of another kind', () => {
    expect(
      fileNameToPrincipal('alice.credentials.enc', '.credentials.json'),
    ).toBeUndefined();
  });

  it('should skip entries that are not valid escapes', () => {
    expect(fileNameToPrincipal('%E0%A4%A.backup.enc', '.backup.enc')).toBeUndefined();
  });
});
