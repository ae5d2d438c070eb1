import { describe, expect, it } from 'vitest';

import { inspectSessionToken, peekSessionId, signSessionToken } from '#token';

const secret = Buffer.from('test-secret-test-secret-test-secret', 'utf8');
const claims = { sid: 's1', sub: 'alice@example.com', iat: 1_700_000_000_000 };

describe('fn:signSessionToken', () => {
  it('should join the encoded claims and a hex mac with a dot', () => {
    const token = signSessionToken(claims, secret);

    const [encoded, signature] = token.split('.');
    expect(JSON.parse(Buffer.from(encoded, 'base64url').toString('utf8'))).toEqual(
      claims,
    );
    expect(signature).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('fn:inspectSessionToken', () => {
  it('should accept a token signed with the same secret', () => {
    const token = signSessionToken(claims, secret);

    expect(inspectSessionToken(token, secret)).toEqual({
      status: 'signed',
      claims,
    });
  });

  it('should flag a token signed with another secret', () => {
    const token = signSessionToken(
      claims,
      Buffer.from('another-secret-another-secret-000', 'utf8'),
    );

    expect(inspectSessionToken(token, secret)).toEqual({
      status: 'invalid_signature',
      claims,
    });
  });

  it.each([
    ['no separator', 'abc'],
    ['too many segments', 'a.b.c'],
    ['claims that are not json', 'bm90LWpzb24.00'],
    ['claims missing a session id', `${Buffer.from('{"sub":"a","iat":1}').toString('base64url')}.00`],
  ])('should treat %s as malformed', (_name, token) => {
    expect(inspectSessionToken(token, secret)).toEqual({ status: 'malformed' });
  });
});

describe('fn:peekSessionId', () => {
  it('should read the claimed session id without verifying', () => {
    expect(peekSessionId(signSessionToken(claims, secret))).toBe('s1');
  });

  it('should return undefined for garbage', () => {
    expect(peekSessionId('garbage')).toBeUndefined();
  });
});
