import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { LOCAL_REDIRECT_URI, createTestGate, registerClient } from '../../../fixtures';

import type { TestGate } from '../../../fixtures';

const BASE_URL = 'https://gate.example.com';

describe('rt:/oauth/register', () => {
  let testGate: TestGate;

  beforeEach(async () => {
    testGate = await createTestGate({ baseUrl: BASE_URL });
  });

  afterEach(async () => {
    await testGate.close();
  });

  describe('POST /oauth/register', () => {
    it('should register a client and return 201', async () => {
      const response = await testGate.app.inject({
        method: 'POST',
        url: '/oauth/register',
        payload: {
          client_name: 'Docs Agent',
          redirect_uris: ['https://agent.example.com/cb'],
        },
      });
      const body = response.json();

      expect(response.statusCode).toBe(201);
      expect(response.headers['cache-control']).toBe('no-store');
      expect(body).toEqual({
        client_name: 'Docs Agent',
        redirect_uris: ['https://agent.example.com/cb'],
        grant_types: ['authorization_code', 'refresh_token'],
        response_types: ['code'],
        token_endpoint_auth_method: 'client_secret_basic',
        scope: 'openid email profile',
        client_id: expect.stringMatching(/^proxy_/),
        client_secret: expect.any(String),
        client_id_issued_at: expect.any(Number),
        client_secret_expires_at: 0,
        registration_access_token: expect.any(String),
        registration_client_uri: `${BASE_URL}/oauth/register/${body.client_id}`,
      });
    });

    it('should accept a registration without a body', async () => {
      const response = await testGate.app.inject({
        method: 'POST',
        url: '/oauth/register',
      });

      expect(response.statusCode).toBe(201);
      expect(response.json().redirect_uris).toEqual([LOCAL_REDIRECT_URI]);
    });

    it('should return 400 for an empty redirect_uris list', async () => {
      const response = await testGate.app.inject({
        method: 'POST',
        url: '/oauth/register',
        payload: { redirect_uris: [] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'invalid_redirect_uri',
        error_description: 'redirect_uris must contain at least one URI',
      });
    });

    it('should return 400 for metadata that is not an object', async () => {
      const response = await testGate.app.inject({
        method: 'POST',
        url: '/oauth/register',
        headers: { 'content-type': 'application/json' },
        payload: '["https://agent.example.com/cb"]',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'invalid_client_metadata',
        error_description: 'client metadata must be a JSON object',
      });
    });

    it('should infer the base url from forwarded headers when none is configured', async () => {
      const inferring = await createTestGate();

      try {
        const response = await inferring.app.inject({
          method: 'POST',
          url: '/oauth/register',
          headers: {
            'x-forwarded-proto': 'https',
            'x-forwarded-host': 'edge.example.com',
          },
        });
        const body = response.json();

        expect(body.registration_client_uri).toBe(
          `https://edge.example.com/oauth/register/${body.client_id}`,
        );
      } finally {
        await inferring.close();
      }
    });
  });

  describe('GET /oauth/register/:client_id', () => {
    it('should return the registration for its access token', async () => {
      const registered = await registerClient(testGate.app);

      const response = await testGate.app.inject({
        method: 'GET',
        url: `/oauth/register/${registered.client_id}`,
        headers: {
          authorization: `Bearer ${registered.registration_access_token}`,
        },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual(registered);
    });

    it('should return 401 without an access token', async () => {
      const registered = await registerClient(testGate.app);

      const response = await testGate.app.inject({
        method: 'GET',
        url: `/oauth/register/${registered.client_id}`,
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({
        error: 'invalid_token',
        error_description: 'registration access token is invalid',
      });
    });

    it('should return 401 for another client token', async () => {
      const first = await registerClient(testGate.app);
      const second = await registerClient(testGate.app);

      const response = await testGate.app.inject({
        method: 'GET',
        url: `/oauth/register/${first.client_id}`,
        headers: {
          authorization: `Bearer ${second.registration_access_token}`,
        },
      });

      expect(response.statusCode).toBe(401);
    });
  });

  describe('PUT /oauth/register/:client_id', () => {
    it('should replace the metadata and rotate the access token', async () => {
      const registered = await registerClient(testGate.app);

      const response = await testGate.app.inject({
        method: 'PUT',
        url: `/oauth/register/${registered.client_id}`,
        headers: {
          authorization: `Bearer ${registered.registration_access_token}`,
        },
        payload: {
          client_name: 'Renamed Agent',
          redirect_uris: ['https://agent.example.com/cb'],
        },
      });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.client_name).toBe('Renamed Agent');
      expect(body.client_id).toBe(registered.client_id);
      expect(body.registration_access_token).not.toBe(
        registered.registration_access_token,
      );
    });

    it('should return 400 for invalid metadata', async () => {
      const registered = await registerClient(testGate.app);

      const response = await testGate.app.inject({
        method: 'PUT',
        url: `/oauth/register/${registered.client_id}`,
        headers: {
          authorization: `Bearer ${registered.registration_access_token}`,
        },
        payload: { grant_types: ['password'] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'invalid_client_metadata',
        error_description: 'unsupported grant_type: password',
      });
    });

    it('should return 401 for a wrong access token', async () => {
      const registered = await registerClient(testGate.app);

      const response = await testGate.app.inject({
        method: 'PUT',
        url: `/oauth/register/${registered.client_id}`,
        headers: { authorization: 'Bearer test-wrong-token' },
        payload: { client_name: 'Renamed Agent' },
      });

      expect(response.statusCode).toBe(401);
    });
  });

  describe('DELETE /oauth/register/:client_id', () => {
    it('should delete the registration', async () => {
      const registered = await registerClient(testGate.app);
      const headers = {
        authorization: `Bearer ${registered.registration_access_token}`,
      };

      const response = await testGate.app.inject({
        method: 'DELETE',
        url: `/oauth/register/${registered.client_id}`,
        headers,
      });
      const reread = await testGate.app.inject({
        method: 'GET',
        url: `/oauth/register/${registered.client_id}`,
        headers,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ success: true });
      expect(reread.statusCode).toBe(401);
    });
  });
});
