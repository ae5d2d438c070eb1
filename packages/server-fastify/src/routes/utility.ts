import { HTTP_OK } from '#constants/http';

import type { Clock } from '@credgate/core';
import type { FastifyPluginAsync } from 'fastify';

/**
 * registers utility routes like health check
 * @param now clock
 * @returns fastify plugin async function
 */
export function registerUtilityRoutes(now: Clock = Date.now): FastifyPluginAsync {
  return async (fastify) => {
    fastify.get('/health', async (_request, reply) =>
      reply.status(HTTP_OK).send({
        status: 'healthy',
        timestamp: new Date(now()).toISOString(),
      }),
    );
  };
}
