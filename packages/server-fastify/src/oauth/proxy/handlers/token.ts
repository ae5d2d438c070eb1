/**
 * @module oauth/proxy/handlers/token
 * @description token handler for the OAuth proxy.
 * Swaps the proxy client for the real one, relays the provider response and
 * binds the issued credential to the caller's session.
 */

import { isSecurityError } from '@credgate/core';

import { HTTP_BAD_REQUEST, HTTP_OK, HTTP_UNAUTHORIZED } from '#constants/http';
import { SESSION_TOKEN_HEADER } from '#request-context';
import { toStoredCredential } from '#session/credential';
import { resolvePrincipal } from '#session/principal';

import {
  extractClientCredentials,
  parseTokenRequest,
  sendErrorResponse,
} from '../proxy-crypto';

import type { FastifyReply, FastifyRequest } from 'fastify';

import type { SessionContext } from '#session/binding';

import type { ClientCredentials } from '../proxy-crypto';
import type { ProxyRouteContext } from '../routes';
import type { ProviderTokenResponseWire, ProxyTokenRequestWire } from '../types';

// HELPER FUNCTIONS //

/**
 * runs a provider call, counting rejected client credentials against the peer
 * @param context handler context
 * @param session session of the request
 * @param call provider call
 * @returns the call result
 */
async function trackClientFailures<T>(
  context: ProxyRouteContext,
  session: SessionContext,
  call: () => Promise<T>,
): Promise<T> {
  try {
    const result = await call();
    context.binding.recordSuccess(session);

    return result;
  } catch (error) {
    if (isSecurityError(error, 'invalid_client_credentials')) {
      context.binding.recordFailure(session);
    }

    throw error;
  }
}

/**
 * relays a provider token response
 * @param reply fastify reply object
 * @param tokens provider response
 */
function sendTokens(
  reply: FastifyReply,
  tokens: ProviderTokenResponseWire,
): void {
  void reply
    .status(HTTP_OK)
    .header('cache-control', 'no-store')
    .header('pragma', 'no-cache')
    .send(tokens);
}

// GRANT HANDLERS //

/**
 * exchanges an authorization code and binds the credential to the session
 * @param reply fastify reply object
 * @param body parsed token request
 * @param client presented client credentials
 * @param session session of the request
 * @param context handler context
 */
async function handleAuthorizationCodeGrant(
  reply: FastifyReply,
  body: ProxyTokenRequestWire,
  client: ClientCredentials,
  session: SessionContext,
  context: ProxyRouteContext,
): Promise<void> {
  const { code } = body;
  if (!code) {
    sendErrorResponse(
      reply,
      HTTP_BAD_REQUEST,
      'invalid_request',
      'code is required',
    );

    return;
  }

  const { tokens, credentials } = await trackClientFailures(
    context,
    session,
    async () =>
      context.proxy.exchangeToken({
        code,
        redirectUri: body.redirect_uri,
        codeVerifier: body.code_verifier,
        clientId: client.clientId,
        clientSecret: client.clientSecret,
      }),
  );

  const principal = await resolvePrincipal(tokens, context.principalLookup);
  if (principal) {
    const credential = toStoredCredential(tokens, {
      tokenUri: context.tokenUri,
      client: credentials,
      receivedAt: context.now(),
      requestedScope: body.scope,
    });
    const sessionToken = await context.binding.bindCredential(
      session,
      principal,
      credential,
    );
    void reply.header(SESSION_TOKEN_HEADER, sessionToken);
  } else {
    context.log?.('warn', 'token response carries no identity', {
      clientId: client.clientId,
    });
  }

  sendTokens(reply, tokens);
}

/**
 * refreshes a token at the provider on behalf of a proxy client
 * @param reply fastify reply object
 * @param body parsed token request
 * @param client presented client credentials
 * @param session session of the request
 * @param context handler context
 */
async function handleRefreshTokenGrant(
  reply: FastifyReply,
  body: ProxyTokenRequestWire,
  client: ClientCredentials,
  session: SessionContext,
  context: ProxyRouteContext,
): Promise<void> {
  const { refresh_token: refreshToken } = body;
  if (!refreshToken) {
    sendErrorResponse(
      reply,
      HTTP_BAD_REQUEST,
      'invalid_request',
      'refresh_token is required',
    );

    return;
  }

  const { tokens } = await trackClientFailures(context, session, async () =>
    context.proxy.refreshToken({
      refreshToken,
      scope: body.scope,
      clientId: client.clientId,
      clientSecret: client.clientSecret,
    }),
  );

  sendTokens(reply, tokens);
}

// TOKEN HANDLER //

/**
 * handles POST /oauth/token
 * @param request fastify request with a form or json body
 * @param reply fastify reply object
 * @param context handler context
 * @throws {SecurityError} `rate_limited` when the peer failed too often
 * @throws {UpstreamExchangeError} when the provider call fails
 */
export async function handleToken(
  request: FastifyRequest,
  reply: FastifyReply,
  context: ProxyRouteContext,
): Promise<void> {
  const session = context.binding.resolve(request);
  context.binding.assertWithinRateLimit(session);

  const body = parseTokenRequest(request.body);
  if (!body.grant_type) {
    sendErrorResponse(
      reply,
      HTTP_BAD_REQUEST,
      'invalid_request',
      'grant_type is required',
    );

    return;
  }

  const client = extractClientCredentials(request, body);
  if (!client) {
    sendErrorResponse(
      reply,
      HTTP_UNAUTHORIZED,
      'invalid_client',
      'client authentication is required',
    );

    return;
  }

  switch (body.grant_type) {
    case 'authorization_code':
      return handleAuthorizationCodeGrant(reply, body, client, session, context);
    case 'refresh_token':
      return handleRefreshTokenGrant(reply, body, client, session, context);
    default:
      sendErrorResponse(
        reply,
        HTTP_BAD_REQUEST,
        'unsupported_grant_type',
        `unsupported grant_type: ${body.grant_type}`,
      );
  }
}
