import { isJsonObject, isLogLevel, parseJson } from '@credgate/core';

import { HTTP_NOT_FOUND } from '#constants/http';

import type { Log } from '@credgate/core';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';

/**
 * creates fastify logger configuration that bridges to a custom log function
 * when no log function is provided, logging is disabled
 * @param log optional custom logging function
 * @returns fastify logger configuration object
 * @example
 * ```typescript
 * const fastify = Fastify({
 *   logger: createLoggerConfig((level, message, meta) => {
 *     process.stderr.write(`[${level}] ${message}\n`);
 *   }),
 * });
 * ```
 */
export function createLoggerConfig(log?: Log): FastifyServerOptions['logger'] {
  if (!log) {
    return false;
  }

  return {
    level: 'trace',
    messageKey: 'message',
    errorKey: 'error',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    // bridge fastify's pino logger to the injected log function
    stream: {
      write: (line: string) => {
        const parsed = parseJson(line);
        if (!isJsonObject(parsed)) {
          log('info', line.trim());

          return;
        }

        const { level, message, ...meta } = parsed;
        const text = typeof message === 'string' ? message : '';
        const severity =
          typeof level === 'string' && isLogLevel(level) ? level : 'info';

        if (Object.keys(meta).length > 0) {
          log(severity, text, meta);
        } else {
          log(severity, text);
        }
      },
    },
  };
}

/**
 * sets up the catch-all route handler for undefined routes
 * @param server the fastify server instance to configure
 */
export function setupNotFoundHandler(server: FastifyInstance): void {
  server.setNotFoundHandler(async (request, reply) => {
    return reply.code(HTTP_NOT_FOUND).send({
      error: 'not_found',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });
}
