import Fastify from 'fastify';
import { describe, expect, it } from 'vitest';

import {
  extractBearerToken,
  extractConnectionInfo,
  extractSessionToken,
  inferBaseUrlFromRequest,
  lastHeader,
} from '#request-context';

import type { IncomingHttpHeaders } from 'node:http';

describe('fn:lastHeader', () => {
  it('should return last value when header exists as array', () => {
    const headers: IncomingHttpHeaders = {
      'x-forwarded-for': ['192.168.1.1', '10.0.0.1', '172.16.0.1'],
    };

    const result = lastHeader(headers, 'x-forwarded-for');

    expect(result).toBe('172.16.0.1');
  });

  it('should handle case-insensitive header lookup', () => {
    const headers: IncomingHttpHeaders = {
      'Content-Type': 'text/html',
    };

    const result = lastHeader(headers, 'content-type');

    expect(result).toBe('text/html');
  });

  it('should return undefined when header does not exist', () => {
    const result = lastHeader({}, 'non-existent-header');

    expect(result).toBeUndefined();
  });
});

describe('fn:extractBearerToken', () => {
  it('should strip the scheme regardless of case', () => {
    expect(extractBearerToken('bearer abc')).toBe('abc');
    expect(extractBearerToken('Bearer abc')).toBe('abc');
  });

  it('should ignore other schemes', () => {
    expect(extractBearerToken('Basic abc')).toBeUndefined();
    expect(extractBearerToken(undefined)).toBeUndefined();
  });
});

describe('fn:extractSessionToken', () => {
  it('should prefer the dedicated header', () => {
    const result = extractSessionToken({
      'x-session-token': 'header-token',
      'authorization': 'Session auth-token',
    });

    expect(result).toBe('header-token');
  });

  it('should fall back to the session authorization scheme', () => {
    expect(extractSessionToken({ authorization: 'Session auth-token' })).toBe(
      'auth-token',
    );
  });

  it('should not treat a bearer token as a session token', () => {
    expect(extractSessionToken({ authorization: 'Bearer abc' })).toBeUndefined();
  });
});

describe('fn:extractConnectionInfo', () => {
  it('should collect peer address and agent of a plain connection', async () => {
    const fastify = Fastify();
    fastify.get('/test', async (request) => extractConnectionInfo(request));

    const response = await fastify.inject({
      method: 'GET',
      url: '/test',
      headers: { 'user-agent': 'test-agent/1.0' },
    });

    expect(response.json()).toEqual({
      ip: '127.0.0.1',
      userAgent: 'test-agent/1.0',
    });

    await fastify.close();
  });
});

describe('fn:inferBaseUrlFromRequest', () => {
  it('should use the host header as given', async () => {
    const fastify = Fastify();
    fastify.get('/test', async (request) => ({
      baseUrl: inferBaseUrlFromRequest(request),
    }));

    const response = await fastify.inject({
      method: 'GET',
      url: '/test',
      headers: { host: 'gate.example.com' },
    });

    expect(response.json()).toEqual({ baseUrl: 'http://gate.example.com' });

    await fastify.close();
  });

  it('should keep the port of the host header', async () => {
    const fastify = Fastify();
    fastify.get('/test', async (request) => ({
      baseUrl: inferBaseUrlFromRequest(request),
    }));

    const response = await fastify.inject({
      method: 'GET',
      url: '/test',
      headers: { host: 'localhost:8000' },
    });

    expect(response.json()).toEqual({ baseUrl: 'http://localhost:8000' });

    await fastify.close();
  });

  it('should honour proxy headers', async () => {
    const fastify = Fastify();
    fastify.get('/test', async (request) => ({
      baseUrl: inferBaseUrlFromRequest(request),
    }));

    const response = await fastify.inject({
      method: 'GET',
      url: '/test',
      headers: {
        'host': 'internal:8000',
        'x-forwarded-proto': 'https',
        'x-forwarded-host': 'gate.example.com',
      },
    });

    expect(response.json()).toEqual({ baseUrl: 'https://gate.example.com' });

    await fastify.close();
  });
});
