import { SecurityError, jsonifyError } from '@credgate/core';

import {
  HTTP_BAD_REQUEST,
  HTTP_INTERNAL_SERVER_ERROR,
  HTTP_TOO_MANY_REQUESTS,
  HTTP_UNAUTHORIZED,
} from '#constants/http';

import type { JsonObject, Log } from '@credgate/core';
import type { FastifyError, FastifyInstance } from 'fastify';

/** response header naming the local failure next to a relayed provider error */
export const ERROR_CODE_HEADER = 'x-credgate-error';

/**
 * provider token call failed, either at the provider or on the way there
 * the payload is the provider's own error body and is relayed unmodified
 */
export class UpstreamExchangeError extends SecurityError {
  public readonly statusCode: number;
  public readonly payload: JsonObject;

  /**
   * creates an upstream exchange error
   * @param params error parameters
   * @param params.message diagnostic message, free of any credential
   * @param params.statusCode status to relay to the caller
   * @param params.payload provider error body
   * @param params.cause underlying network error, if any
   */
  constructor(params: {
    message: string;
    statusCode: number;
    payload: JsonObject;
    cause?: unknown;
  }) {
    super('upstream_exchange_failed', params.message, { cause: params.cause });
    this.name = 'UpstreamExchangeError';
    this.statusCode = params.statusCode;
    this.payload = params.payload;
  }
}

/**
 * installs the error handler that turns thrown errors into http responses
 * rejected session or credential access always reads as the same generic 401
 * @param server the fastify server instance to configure
 * @param log optional logging function
 */
export function setupErrorHandler(server: FastifyInstance, log?: Log): void {
  server.setErrorHandler<FastifyError>(async (error, request, reply) => {
    if (error instanceof UpstreamExchangeError) {
      return reply
        .code(error.statusCode)
        .header(ERROR_CODE_HEADER, error.code)
        .send(error.payload);
    }

    if (error instanceof SecurityError) {
      switch (error.code) {
        case 'rate_limited':
          return reply
            .code(HTTP_TOO_MANY_REQUESTS)
            .send({ error: 'rate_limited' });
        case 'client_not_found':
        case 'invalid_client_credentials':
          return reply.code(HTTP_UNAUTHORIZED).send({
            error: 'invalid_client',
            error_description: 'client authentication failed',
          });
        case 'invalid_registration_token':
          return reply.code(HTTP_UNAUTHORIZED).send({
            error: 'invalid_token',
            error_description: 'registration access token is invalid',
          });
        case 'unauthorized':
        case 'session_not_found':
        case 'session_expired':
          return reply
            .code(HTTP_UNAUTHORIZED)
            .send({ error: 'authentication_required' });
        default:
          break;
      }
    }

    // fastify's own client errors, e.g. an unparsable body
    if (
      error.statusCode !== undefined &&
      error.statusCode >= HTTP_BAD_REQUEST &&
      error.statusCode < HTTP_INTERNAL_SERVER_ERROR
    ) {
      return reply.code(error.statusCode).send({
        error: 'invalid_request',
        error_description: error.message,
      });
    }

    log?.('error', 'request failed', {
      method: request.method,
      url: request.url,
      error: jsonifyError(error),
    });

    return reply
      .code(HTTP_INTERNAL_SERVER_ERROR)
      .send({ error: 'server_error' });
  });
}
