/**
 * @module oauth/proxy/handlers/authorize
 * @description authorization handler for the OAuth proxy.
 * Validates the proxy client and redirects to the provider with the real client_id.
 */

import { HTTP_BAD_REQUEST, HTTP_FOUND } from '#constants/http';

import { sendErrorResponse } from '../proxy-crypto';

import type { FastifyReply, FastifyRequest } from 'fastify';

import type { ProxyRouteContext } from '../routes';
import type { ProxyAuthorizeRequestWire } from '../types';

/**
 * handles GET /oauth/authorize
 * errors are answered directly instead of redirecting, since the redirect_uri is not trusted yet
 * @param request fastify request with the authorization query
 * @param reply fastify reply object
 * @param context handler context
 */
export async function handleAuthorize(
  request: FastifyRequest<{ Querystring: ProxyAuthorizeRequestWire }>,
  reply: FastifyReply,
  context: ProxyRouteContext,
): Promise<void> {
  const result = context.proxy.authorize(request.query);

  switch (result.status) {
    case 'redirect':
      void reply.redirect(result.url, HTTP_FOUND);
      break;
    case 'invalid_client':
      sendErrorResponse(
        reply,
        HTTP_BAD_REQUEST,
        'invalid_client',
        'unknown or expired client_id',
      );
      break;
    case 'invalid_request':
      sendErrorResponse(
        reply,
        HTTP_BAD_REQUEST,
        'invalid_request',
        result.description,
      );
      break;
  }
}
