import { HTTP_NOT_FOUND, HTTP_OK } from '#constants/http';

import type { Clock } from '@credgate/core';
import type { StoredCredential } from '@credgate/credential-store';
import type { FastifyPluginAsync } from 'fastify';

import type { SessionBinding } from '#session/binding';

// TYPES //

/** route parameters naming a principal */
interface PrincipalParams {
  principal: string;
}

/** what a caller may learn about a stored credential */
export interface CredentialStatus {
  principal: string;
  scopes: string[];
  /** ISO 8601 expiry, null when the provider gave none */
  expiresAt: string | null;
  hasRefreshToken: boolean;
  expired: boolean;
}

// HELPER FUNCTIONS //

/**
 * redacts a credential down to its status
 * @param principal principal the credential belongs to
 * @param credential stored credential
 * @param now current epoch milliseconds
 * @returns status without token values
 */
export function toCredentialStatus(
  principal: string,
  credential: StoredCredential,
  now: number,
): CredentialStatus {
  return {
    principal,
    scopes: credential.scopes,
    expiresAt:
      credential.expiresAt === undefined
        ? null
        : new Date(credential.expiresAt).toISOString(),
    hasRefreshToken: credential.refreshToken !== undefined,
    expired: credential.expiresAt !== undefined && credential.expiresAt <= now,
  };
}

// ROUTES //

/**
 * registers the routes a session holder uses to inspect and end its session
 * none of them ever returns a token value
 * @param binding session binding
 * @param now clock
 * @returns fastify plugin async function
 */
export function registerSessionRoutes(
  binding: SessionBinding,
  now: Clock = Date.now,
): FastifyPluginAsync {
  return async (fastify) => {
    // GET /session - describe the presented session
    fastify.get('/session', async (request, reply) => {
      const info = binding.describe(binding.resolve(request));

      return reply.status(HTTP_OK).send({
        sessionId: info.sessionId,
        principal: info.principal,
        principals: info.principals,
        authMethod: info.authMethod,
        createdAt: new Date(info.createdAt).toISOString(),
        expiresAt: new Date(info.expiresAt).toISOString(),
        lastAccessed: new Date(info.lastAccessed).toISOString(),
      });
    });

    // DELETE /session - revoke the presented session
    fastify.delete('/session', async (request, reply) => {
      binding.revoke(binding.resolve(request));

      return reply.status(HTTP_OK).send({ success: true });
    });

    // DELETE /session/principals/:principal - withdraw one principal
    fastify.delete<{ Params: PrincipalParams }>(
      '/session/principals/:principal',
      async (request, reply) => {
        const removed = binding.revokePrincipal(
          binding.resolve(request),
          request.params.principal,
        );

        return removed
          ? reply.status(HTTP_OK).send({ success: true })
          : reply.status(HTTP_NOT_FOUND).send({
              error: 'not_found',
              message: 'principal is not bound to this session',
            });
      },
    );

    // GET /session/credentials/:principal - redacted credential status
    fastify.get<{ Params: PrincipalParams }>(
      '/session/credentials/:principal',
      async (request, reply) => {
        const { principal } = request.params;
        const credential = await binding.requireCredential(
          binding.resolve(request),
          principal,
        );

        return reply
          .status(HTTP_OK)
          .send(toCredentialStatus(principal, credential, now()));
      },
    );

    // POST /session/credentials/:principal/refresh - refresh at the provider
    fastify.post<{ Params: PrincipalParams }>(
      '/session/credentials/:principal/refresh',
      async (request, reply) => {
        const { principal } = request.params;
        const credential = await binding.refreshCredential(
          binding.resolve(request),
          principal,
        );

        return reply
          .status(HTTP_OK)
          .send(toCredentialStatus(principal, credential, now()));
      },
    );
  };
}
