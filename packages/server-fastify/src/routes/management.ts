import { isJsonObject } from '@credgate/core';
import { isStorageMode } from '@credgate/credential-store';

import {
  HTTP_BAD_REQUEST,
  HTTP_OK,
  HTTP_UNAUTHORIZED,
} from '#constants/http';
import { safeEqual } from '#oauth/proxy/proxy-crypto';
import { extractBearerToken, lastHeader } from '#request-context';

import type { Clock, Log } from '@credgate/core';
import type { CredentialStore } from '@credgate/credential-store';
import type { SessionSecurityManager } from '@credgate/session-security';
import type { FastifyPluginAsync } from 'fastify';

import type { CredentialProxy } from '#oauth/proxy/credential-proxy';

// TYPES //

/** what one sweep removed */
export interface SweepResult {
  sessionsCleanedUp: number;
  proxyClientsExpired: number;
}

/** collaborators of the management routes */
export interface ManagementRouteContext {
  manager: SessionSecurityManager;
  store: CredentialStore;
  proxy: CredentialProxy;
  /** removes expired sessions and proxy clients */
  sweep: () => SweepResult;
  /** token for authentication (or undefined to use env var) */
  managementToken?: string;
  log?: Log;
  now?: Clock;
}

// ROUTES //

/**
 * registers management routes for administrative operations
 * all endpoints require Bearer token authentication
 * @param context management collaborators
 * @returns fastify plugin async function
 */
export function registerManagementRoutes(
  context: ManagementRouteContext,
): FastifyPluginAsync {
  const { manager, store, proxy, log } = context;
  const now = context.now ?? Date.now;

  return async (fastify) => {
    // every route of this plugin is guarded by the management token
    fastify.addHook('onRequest', async (request, reply) => {
      const token = extractBearerToken(
        lastHeader(request.headers, 'authorization'),
      );

      const expectedToken =
        context.managementToken ?? process.env.CREDGATE_MANAGEMENT_TOKEN;

      if (!expectedToken || !token || !safeEqual(token, expectedToken)) {
        log?.('warn', 'Unauthorized management endpoint access attempt', {
          endpoint: request.url,
          hasToken: !!token,
        });

        return reply.code(HTTP_UNAUTHORIZED).send({
          error: 'unauthorized',
          message: 'Invalid or missing management token',
        });
      }
    });

    /**
     * POST /management/cleanup - remove expired sessions and proxy clients
     * response:
     * - success: boolean
     * - sessionsCleanedUp: number
     * - proxyClientsExpired: number
     * - timestamp: string (ISO 8601)
     */
    fastify.post('/management/cleanup', async (_request, reply) => {
      const result = context.sweep();

      log?.('info', 'Management cleanup completed', { ...result });

      return reply.status(HTTP_OK).send({
        success: true,
        ...result,
        timestamp: new Date(now()).toISOString(),
      });
    });

    // GET /management/storage - what is stored where, never the values
    fastify.get('/management/storage', async (_request, reply) =>
      reply.status(HTTP_OK).send(await store.summary()),
    );

    /**
     * POST /management/storage/migrate - switch the storage mode
     * request body:
     * - mode: storage mode to migrate to
     * - purgeSource?: boolean - delete what only the old mode used
     */
    fastify.post('/management/storage/migrate', async (request, reply) => {
      const { body } = request;
      const mode = isJsonObject(body) ? body.mode : undefined;
      const purgeSource = isJsonObject(body) ? body.purgeSource : undefined;

      if (typeof mode !== 'string' || !isStorageMode(mode)) {
        return reply.code(HTTP_BAD_REQUEST).send({
          error: 'invalid_request',
          message:
            'mode must be one of plaintext_file, encrypted_file, memory_only, memory_with_backup',
        });
      }

      if (purgeSource !== undefined && typeof purgeSource !== 'boolean') {
        return reply.code(HTTP_BAD_REQUEST).send({
          error: 'invalid_request',
          message: 'purgeSource must be a boolean',
        });
      }

      const report = await store.migrate(mode, { purgeSource });

      return reply.status(HTTP_OK).send(report);
    });

    // GET /management/stats - counters for sessions, proxy clients and storage
    fastify.get('/management/stats', async (_request, reply) =>
      reply.status(HTTP_OK).send({
        activeSessions: manager.activeSessionCount,
        proxyClients: proxy.stats(),
        storageMode: store.mode,
        timestamp: new Date(now()).toISOString(),
      }),
    );
  };
}
