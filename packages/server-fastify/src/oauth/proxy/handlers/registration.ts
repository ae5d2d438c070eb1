/**
 * @module oauth/proxy/handlers/registration
 * @description Dynamic client registration (RFC 7591) and registration
 * management (RFC 7592) for proxy clients.
 */

import { SecurityError } from '@credgate/core';

import { HTTP_BAD_REQUEST, HTTP_CREATED, HTTP_OK } from '#constants/http';
import {
  extractBearerToken,
  inferBaseUrlFromRequest,
  lastHeader,
} from '#request-context';

import { sendErrorResponse } from '../proxy-crypto';
import { ClientRegistrationError } from '../registration';

import type { FastifyReply, FastifyRequest } from 'fastify';

import type { ClientRegistrationParams, ProxyRouteContext } from '../routes';

// TYPES //

type ClientRegistrationRequest = FastifyRequest<{
  Params: ClientRegistrationParams;
}>;

// HELPER FUNCTIONS //

/**
 * resolves the public base url used in registration_client_uri
 * @param request fastify request
 * @param context handler context
 * @returns base url without a trailing slash
 */
function resolveBaseUrl(
  request: FastifyRequest,
  context: ProxyRouteContext,
): string {
  return (context.baseUrl ?? inferBaseUrlFromRequest(request)).replace(
    /\/+$/,
    '',
  );
}

/**
 * reads the registration access token of a management request
 * @param request fastify request
 * @returns bearer token
 * @throws {SecurityError} `invalid_registration_token` when no bearer token is present
 */
function requireRegistrationToken(request: FastifyRequest): string {
  const token = extractBearerToken(
    lastHeader(request.headers, 'authorization'),
  );
  if (!token) {
    throw new SecurityError(
      'invalid_registration_token',
      'registration access token is missing',
    );
  }

  return token;
}

/**
 * rejects a management request whose token or client did not match
 * @param clientId requested client
 * @returns never
 * @throws {SecurityError} `invalid_registration_token`
 */
function rejectRegistrationToken(clientId: string): never {
  throw new SecurityError(
    'invalid_registration_token',
    `registration access token rejected for ${clientId}`,
  );
}

/**
 * runs a registration call, answering rejected metadata with 400
 * @param reply fastify reply object
 * @param operation registration call
 * @returns the operation result, or undefined when an error response was sent
 */
function withMetadataValidation<T>(
  reply: FastifyReply,
  operation: () => T,
): T | undefined {
  try {
    return operation();
  } catch (error) {
    if (error instanceof ClientRegistrationError) {
      sendErrorResponse(reply, HTTP_BAD_REQUEST, error.code, error.message);

      return undefined;
    }

    throw error;
  }
}

// REGISTRATION HANDLERS //

/**
 * handles POST /oauth/register
 * @param request fastify request with the client metadata body
 * @param reply fastify reply object
 * @param context handler context
 */
export async function handleClientRegistration(
  request: FastifyRequest,
  reply: FastifyReply,
  context: ProxyRouteContext,
): Promise<void> {
  const response = withMetadataValidation(reply, () =>
    context.proxy.registerClient(request.body, resolveBaseUrl(request, context)),
  );

  if (response) {
    void reply
      .status(HTTP_CREATED)
      .header('cache-control', 'no-store')
      .send(response);
  }
}

/**
 * handles GET /oauth/register/:client_id
 * @param request fastify request with the client_id param
 * @param reply fastify reply object
 * @param context handler context
 */
export async function handleClientRead(
  request: ClientRegistrationRequest,
  reply: FastifyReply,
  context: ProxyRouteContext,
): Promise<void> {
  const { client_id: clientId } = request.params;
  const response =
    context.proxy.getClient(
      clientId,
      requireRegistrationToken(request),
      resolveBaseUrl(request, context),
    ) ?? rejectRegistrationToken(clientId);

  void reply
    .status(HTTP_OK)
    .header('cache-control', 'no-store')
    .send(response);
}

/**
 * handles PUT /oauth/register/:client_id
 * @param request fastify request with the client_id param and new metadata
 * @param reply fastify reply object
 * @param context handler context
 */
export async function handleClientUpdate(
  request: ClientRegistrationRequest,
  reply: FastifyReply,
  context: ProxyRouteContext,
): Promise<void> {
  const { client_id: clientId } = request.params;
  const token = requireRegistrationToken(request);

  const response = withMetadataValidation(reply, () =>
    context.proxy.updateClient(
      clientId,
      request.body,
      token,
      resolveBaseUrl(request, context),
    ),
  );

  if (response === null) {
    rejectRegistrationToken(clientId);
  }

  if (response) {
    void reply
      .status(HTTP_OK)
      .header('cache-control', 'no-store')
      .send(response);
  }
}

/**
 * handles DELETE /oauth/register/:client_id
 * @param request fastify request with the client_id param
 * @param reply fastify reply object
 * @param context handler context
 */
export async function handleClientDelete(
  request: ClientRegistrationRequest,
  reply: FastifyReply,
  context: ProxyRouteContext,
): Promise<void> {
  const { client_id: clientId } = request.params;

  const token = requireRegistrationToken(request);
  if (!context.proxy.deleteClient(clientId, token)) {
    rejectRegistrationToken(clientId);
  }

  void reply.status(HTTP_OK).send({ success: true });
}
