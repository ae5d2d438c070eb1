import { describe, expect, it } from 'vitest';

import { fromCredentialWire, toCredentialWire } from '#codec';

import { credential } from './fixtures';

describe('fn:toCredentialWire', () => {
  it('should write snake_case fields with an ISO expiry', () => {
    expect(toCredentialWire(credential)).toEqual({
      token: 'at-test-1',
      refresh_token: 'rt-test-1',
      token_uri: 'https://provider.test/token',
      client_id: 'real-client',
      client_secret: 'test-secret',
      scopes: ['openid', 'email'],
      expiry: '2030-01-01T00:00:00.000Z',
    });
  });

  it('should write null for absent optional fields', () => {
    const { refreshToken: _r, expiresAt: _e, ...required } = credential;

    const wire = toCredentialWire(required);

    expect(wire.refresh_token).toBeNull();
    expect(wire.expiry).toBeNull();
  });
});

describe('fn:fromCredentialWire', () => {
  it('should read back what toCredentialWire wrote', () => {
    expect(fromCredentialWire(toCredentialWire(credential))).toEqual(
      credential,
    );
  });

  it('should omit optional fields stored as null', () => {
    expect(
      fromCredentialWire({
        token: 'at-test-2',
        refresh_token: null,
        token_uri: 'https://provider.test/token',
        client_id: 'real-client',
        client_secret: 'test-secret',
        scopes: [],
        expiry: null,
      }),
    ).toEqual({
      token: 'at-test-2',
      tokenUri: 'https://provider.test/token',
      clientId: 'real-client',
      clientSecret: 'test-secret',
      scopes: [],
    });
  });

  it('should ignore extra fields such as the encryption metadata', () => {
    const result = fromCredentialWire({
      ...toCredentialWire(credential),
      encrypted_at: '2026-01-01T00:00:00.000Z',
      storage_mode: 'encrypted_file',
    });

    expect(result).toEqual(credential);
  });

  it.each([
    ['a non-object', 'token'],
    ['a missing token', { token_uri: 'x', client_id: 'x', client_secret: 'x', scopes: [] }],
    ['non-string scopes', { ...toCredentialWire(credential), scopes: [1] }],
    ['an unparseable expiry', { ...toCredentialWire(credential), expiry: 'soon' }],
  ])('should reject %s', (_name, input) => {
    expect(fromCredentialWire(input)).toBeNull();
  });
});
