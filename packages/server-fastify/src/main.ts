/**
 * starts the credential gate from environment variables
 *
 * logs json lines to stderr, filtered by CREDGATE_LOG_LEVEL (default: info).
 */

import { filterLog, isLogLevel, jsonifyError } from '@credgate/core';

import { loadConfigFromEnv } from '#config';
import { CredentialGateServer } from '#http';

import type { Log, LogLevel } from '@credgate/core';

// CONSTANTS //

const DEFAULT_LOG_LEVEL: LogLevel = 'info';

// FUNCTIONS //

/**
 * logs messages to stderr for server diagnostics
 * @param level log severity level
 * @param message log message content
 * @param data optional structured data for context
 */
const writeLog: Log = (level, message, data) => {
  const timestamp = new Date().toISOString();
  const logEntry = JSON.stringify({ timestamp, level, message, ...data });

  process.stderr.write(`${logEntry}\n`);
};

/**
 * starts the server and stops it again on SIGINT or SIGTERM
 */
async function startServer(): Promise<void> {
  const level = process.env.CREDGATE_LOG_LEVEL?.trim().toLowerCase();
  const log = filterLog(
    writeLog,
    level && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL,
  );

  const server = new CredentialGateServer({ ...loadConfigFromEnv(), log });

  const shutdown = (signal: NodeJS.Signals): void => {
    log('info', `received ${signal} signal, initiating graceful shutdown`);
    server.stop().catch((error: unknown) => {
      log('error', 'graceful shutdown failed', { error: jsonifyError(error) });
      process.exitCode = 1;
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await server.start();
}

// start server immediately
startServer().catch((error: unknown) => {
  writeLog('fatal', 'credgate failed to start', { error: jsonifyError(error) });
  process.exitCode = 1;
});
