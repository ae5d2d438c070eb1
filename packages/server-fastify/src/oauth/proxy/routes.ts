/**
 * OAuth Proxy Route Registration
 * Registers the client registration, authorization and token routes
 */

import {
  handleClientDelete,
  handleClientRead,
  handleClientRegistration,
  handleClientUpdate,
} from './handlers/registration';
import { handleAuthorize } from './handlers/authorize';
import { handleToken } from './handlers/token';

import type { Clock, Log } from '@credgate/core';
import type { FastifyPluginAsync } from 'fastify';

import type { SessionBinding } from '#session/binding';
import type { PrincipalLookupOptions } from '#session/principal';

import type { CredentialProxy } from './credential-proxy';
import type { ProxyAuthorizeRequestWire } from './types';

// ROUTE PATH CONSTANTS //

/** oauth proxy route paths */
export const PROXY_ROUTES = {
  /** dynamic client registration (RFC 7591) */
  register: '/oauth/register',

  /** registration management (RFC 7592) */
  registration: '/oauth/register/:client_id',

  /** authorization endpoint, redirects to the provider */
  authorize: '/oauth/authorize',

  /** token endpoint, forwards to the provider */
  token: '/oauth/token',
} as const;

// TYPES //

/** everything the proxy handlers need */
export interface ProxyRouteContext {
  proxy: CredentialProxy;
  binding: SessionBinding;
  /** public base url; inferred from each request when absent */
  baseUrl?: string;
  /** provider token endpoint recorded on stored credentials */
  tokenUri: string;
  principalLookup: PrincipalLookupOptions;
  log?: Log;
  now: Clock;
}

/** route parameters of the registration management endpoints */
export interface ClientRegistrationParams {
  /** proxy client identifier */
  client_id: string;
}

// ROUTE REGISTRATION //

/**
 * creates fastify plugin that registers all oauth proxy routes
 * @param context handler context
 * @returns fastify plugin async function
 */
export function registerProxyRoutes(
  context: ProxyRouteContext,
): FastifyPluginAsync {
  return async (fastify) => {
    // POST /oauth/register - dynamic client registration
    fastify.post(PROXY_ROUTES.register, async (request, reply) =>
      handleClientRegistration(request, reply, context),
    );

    // GET /oauth/register/:client_id - read a registration
    fastify.get<{ Params: ClientRegistrationParams }>(
      PROXY_ROUTES.registration,
      async (request, reply) => handleClientRead(request, reply, context),
    );

    // PUT /oauth/register/:client_id - replace a registration
    fastify.put<{ Params: ClientRegistrationParams }>(
      PROXY_ROUTES.registration,
      async (request, reply) => handleClientUpdate(request, reply, context),
    );

    // DELETE /oauth/register/:client_id - delete a registration
    fastify.delete<{ Params: ClientRegistrationParams }>(
      PROXY_ROUTES.registration,
      async (request, reply) => handleClientDelete(request, reply, context),
    );

    // GET /oauth/authorize - redirect to the provider with the real client_id
    fastify.get<{ Querystring: ProxyAuthorizeRequestWire }>(
      PROXY_ROUTES.authorize,
      async (request, reply) => handleAuthorize(request, reply, context),
    );

    // POST /oauth/token - exchange with the provider using the real client
    fastify.post(PROXY_ROUTES.token, async (request, reply) =>
      handleToken(request, reply, context),
    );
  };
}
