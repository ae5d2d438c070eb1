import fastify from 'fastify';
import { describe, expect, it } from 'vitest';

import { registerUtilityRoutes } from '#routes/utility';

import { START } from '../fixtures';

describe('fn:registerUtilityRoutes', () => {
  it('should return healthy status from health endpoint', async () => {
    const app = fastify();
    await app.register(registerUtilityRoutes(() => START));

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'healthy',
      timestamp: '2026-03-01T12:00:00.000Z',
    });

    await app.close();
  });

  it('should not require any authentication', async () => {
    const app = fastify();
    await app.register(registerUtilityRoutes(() => START));

    const response = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { authorization: 'Bearer wrong-token' },
    });

    expect(response.statusCode).toBe(200);

    await app.close();
  });
});
