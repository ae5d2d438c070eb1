import { describe, expect, it } from 'vitest';

import { loadConfigFromEnv, validateConfig } from '#config';

import { SESSION_SECRET, provider } from './fixtures';

import type { CredentialGateOptions } from '#config';

const validEnv = {
  OAUTH_CLIENT_ID: 'real-client-id',
  OAUTH_CLIENT_SECRET: 'real-client-secret',
  OAUTH_AUTHORIZATION_ENDPOINT: 'https://provider.test/authorize',
  OAUTH_TOKEN_ENDPOINT: 'https://provider.test/token',
};

describe('fn:loadConfigFromEnv', () => {
  it('should apply defaults for unset variables', () => {
    expect(loadConfigFromEnv(validEnv)).toEqual({
      host: '0.0.0.0',
      port: 8000,
      baseUrl: undefined,
      provider: {
        clientId: 'real-client-id',
        clientSecret: 'real-client-secret',
        authorizationEndpoint: 'https://provider.test/authorize',
        tokenEndpoint: 'https://provider.test/token',
        userinfoEndpoint: undefined,
        tokenEndpointAuthMethod: undefined,
      },
      session: { secret: undefined, timeoutMs: undefined },
      storage: {
        mode: 'encrypted_file',
        directory: './credentials',
        encryptionKey: undefined,
      },
      proxy: { defaultScopeGroup: undefined },
      managementToken: undefined,
      auditLogPath: undefined,
    });
  });

  it('should read every supported variable', () => {
    const options = loadConfigFromEnv({
      ...validEnv,
      CREDGATE_HOST: '127.0.0.1',
      CREDGATE_PORT: '9000',
      CREDGATE_BASE_URL: 'https://gate.example.com',
      OAUTH_USERINFO_ENDPOINT: 'https://provider.test/userinfo',
      OAUTH_TOKEN_ENDPOINT_AUTH_METHOD: 'client_secret_basic',
      SESSION_SECRET,
      SESSION_TIMEOUT_MINUTES: '45',
      CREDENTIAL_STORAGE_MODE: 'memory_with_backup',
      CREDENTIALS_DIR: '/var/lib/credgate',
      CREDGATE_SCOPE_GROUP: 'drive',
      CREDGATE_MANAGEMENT_TOKEN: 'test-management-token',
      CREDGATE_AUDIT_LOG: '/var/log/credgate/audit.jsonl',
    });

    expect(options).toEqual(
      expect.objectContaining({
        host: '127.0.0.1',
        port: 9000,
        baseUrl: 'https://gate.example.com',
        session: { secret: SESSION_SECRET, timeoutMs: 45 * 60 * 1000 },
        storage: {
          mode: 'memory_with_backup',
          directory: '/var/lib/credgate',
          encryptionKey: undefined,
        },
        proxy: { defaultScopeGroup: 'drive' },
        managementToken: 'test-management-token',
        auditLogPath: '/var/log/credgate/audit.jsonl',
      }),
    );
    expect(options.provider.userinfoEndpoint).toBe(
      'https://provider.test/userinfo',
    );
    expect(options.provider.tokenEndpointAuthMethod).toBe(
      'client_secret_basic',
    );
  });

  it('should treat blank variables as unset', () => {
    expect(
      loadConfigFromEnv({ ...validEnv, CREDGATE_HOST: '  ' }).host,
    ).toBe('0.0.0.0');
  });

  it('should leave missing provider fields empty', () => {
    expect(loadConfigFromEnv({}).provider.clientId).toBe('');
  });

  it('should throw for a port that is not a positive integer', () => {
    expect(() =>
      loadConfigFromEnv({ ...validEnv, CREDGATE_PORT: 'http' }),
    ).toThrow('credgate config: CREDGATE_PORT must be a positive integer');
  });

  it('should throw for a port out of range', () => {
    expect(() =>
      loadConfigFromEnv({ ...validEnv, CREDGATE_PORT: '70000' }),
    ).toThrow('credgate config: CREDGATE_PORT must be a port number');
  });

  it('should throw for an unsupported storage mode', () => {
    expect(() =>
      loadConfigFromEnv({ ...validEnv, CREDENTIAL_STORAGE_MODE: 'cloud' }),
    ).toThrow('credgate config: unsupported CREDENTIAL_STORAGE_MODE: cloud');
  });

  it('should throw for an unsupported provider auth method', () => {
    expect(() =>
      loadConfigFromEnv({
        ...validEnv,
        OAUTH_TOKEN_ENDPOINT_AUTH_METHOD: 'private_key_jwt',
      }),
    ).toThrow(
      'credgate config: unsupported OAUTH_TOKEN_ENDPOINT_AUTH_METHOD: private_key_jwt',
    );
  });

  it('should throw for a session timeout of zero', () => {
    expect(() =>
      loadConfigFromEnv({ ...validEnv, SESSION_TIMEOUT_MINUTES: '0' }),
    ).toThrow(
      'credgate config: SESSION_TIMEOUT_MINUTES must be a positive integer',
    );
  });
});

describe('fn:validateConfig', () => {
  const createOptions = (
    overrides: Partial<CredentialGateOptions> = {},
  ): CredentialGateOptions => ({
    provider,
    session: { secret: SESSION_SECRET },
    storage: { mode: 'encrypted_file', directory: './credentials' },
    ...overrides,
  });

  it('should accept valid options', () => {
    expect(() => validateConfig(createOptions())).not.toThrow();
  });

  it('should accept options without a session secret', () => {
    expect(() => validateConfig(createOptions({ session: {} }))).not.toThrow();
  });

  it.each([
    ['clientId', 'credgate config: provider.clientId is required'],
    ['clientSecret', 'credgate config: provider.clientSecret is required'],
    [
      'authorizationEndpoint',
      'credgate config: provider.authorizationEndpoint is required',
    ],
    ['tokenEndpoint', 'credgate config: provider.tokenEndpoint is required'],
  ])('should throw when provider.%s is empty', (field, message) => {
    expect(() =>
      validateConfig(createOptions({ provider: { ...provider, [field]: '' } })),
    ).toThrow(message);
  });

  it('should throw for a short session secret', () => {
    expect(() =>
      validateConfig(createOptions({ session: { secret: 'test-secret' } })),
    ).toThrow('credgate config: session.secret must be at least 32 characters');
  });

  it('should throw for an empty storage directory', () => {
    expect(() =>
      validateConfig(
        createOptions({ storage: { mode: 'memory_only', directory: '' } }),
      ),
    ).toThrow('credgate config: storage.directory is required');
  });

  it('should accept a 32-byte encryption key', () => {
    expect(() =>
      validateConfig(
        createOptions({
          storage: {
            mode: 'encrypted_file',
            directory: './credentials',
            encryptionKey: Buffer.alloc(32, 7).toString('base64'),
          },
        }),
      ),
    ).not.toThrow();
  });

  it('should throw for an encryption key of the wrong length', () => {
    expect(() =>
      validateConfig(
        createOptions({
          storage: {
            mode: 'encrypted_file',
            directory: './credentials',
            encryptionKey: Buffer.alloc(16, 7).toString('base64'),
          },
        }),
      ),
    ).toThrow('credgate config: storage.encryptionKey is invalid');
  });
});
