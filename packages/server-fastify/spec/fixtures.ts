import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { MemoryAuditLog } from '@credgate/session-security';
import { vi } from 'vitest';

import { CredentialGateServer } from '#http';

import type { Log } from '@credgate/core';
import type { FastifyInstance, LightMyRequestResponse } from 'fastify';
import type { Mock } from 'vitest';

import type { CredentialGateOptions } from '#config';
import type { ProviderClientConfig } from '#oauth/proxy/types';

// common values for server tests

export const START = Date.parse('2026-03-01T12:00:00.000Z');
export const SESSION_SECRET = 'test-secret-test-secret-test-secret';
export const MANAGEMENT_TOKEN = 'test-management-token';
export const LOCAL_REDIRECT_URI = 'http://localhost:3000/auth/callback';

export const provider: ProviderClientConfig = {
  clientId: 'real-client-id',
  clientSecret: 'real-client-secret',
  authorizationEndpoint: 'https://provider.test/authorize',
  tokenEndpoint: 'https://provider.test/token',
};

/**
 * builds a json response as the provider would send it
 * @param body response body
 * @param status http status
 * @returns fetch response
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * builds an unsigned id_token carrying the given claims
 * @param claims jwt claims
 * @returns compact jwt
 */
export function createIdToken(claims: Record<string, unknown>): string {
  const encode = (value: unknown): string =>
    Buffer.from(JSON.stringify(value)).toString('base64url');

  return `${encode({ alg: 'none' })}.${encode(claims)}.signature`;
}

/**
 * encodes a basic authorization header without form encoding
 * @param clientId client identifier
 * @param clientSecret client secret
 * @returns header value
 */
export function basicAuth(clientId: string, clientSecret: string): string {
  return `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`;
}

/** a gate wired to an in-memory audit log and a controllable clock */
export interface TestGate {
  gate: CredentialGateServer;
  app: FastifyInstance;
  audit: MemoryAuditLog;
  log: Mock<Log>;
  advance: (ms: number) => void;
  close: () => Promise<void>;
}

/**
 * creates a gate over a fresh temporary credentials directory
 * @param overrides extra gate options
 * @returns gate and test controls
 */
export async function createTestGate(
  overrides: Partial<CredentialGateOptions> = {},
): Promise<TestGate> {
  let now = START;
  const directory = await mkdtemp(join(tmpdir(), 'credgate-server-'));
  const audit = new MemoryAuditLog();
  const log = vi.fn<Log>();

  const gate = new CredentialGateServer({
    provider,
    session: { secret: SESSION_SECRET },
    storage: { mode: 'memory_only', directory },
    managementToken: MANAGEMENT_TOKEN,
    auditLog: audit,
    log,
    now: () => now,
    ...overrides,
  });
  await gate.app.ready();

  return {
    gate,
    app: gate.app,
    audit,
    log,
    advance: (ms) => (now += ms),
    close: async () => {
      await gate.stop();
      await rm(directory, { recursive: true, force: true });
    },
  };
}

/**
 * registers a proxy client through the http surface
 * @param app fastify instance
 * @param metadata client metadata
 * @returns the registration response
 */
export async function registerClient(
  app: FastifyInstance,
  metadata: Record<string, unknown> = { redirect_uris: [LOCAL_REDIRECT_URI] },
): Promise<{
  client_id: string;
  client_secret: string;
  registration_access_token: string;
}> {
  const response = await app.inject({
    method: 'POST',
    url: '/oauth/register',
    payload: metadata,
  });

  return response.json();
}

/**
 * reads the session token issued on a token response
 * @param response injected response
 * @returns the session token or undefined
 */
export function sessionTokenOf(
  response: LightMyRequestResponse,
): string | undefined {
  const header = response.headers['x-session-token'];

  return typeof header === 'string' ? header : undefined;
}
