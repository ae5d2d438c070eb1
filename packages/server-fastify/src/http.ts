import { CredentialStore } from '@credgate/credential-store';
import {
  JsonlAuditLog,
  SessionSecurityManager,
  createLogAuditLog,
} from '@credgate/session-security';
import formbody from '@fastify/formbody';
import fastify from 'fastify';

import {
  DEFAULT_HOST,
  DEFAULT_HTTP_PORT,
  DEFAULT_SCOPE_GROUP,
  DEFAULT_SWEEP_INTERVAL_MS,
  DEFAULT_UPSTREAM_TIMEOUT_MS,
} from '#constants/defaults';
import { validateConfig } from '#config';
import { setupErrorHandler } from '#errors';
import { createLoggerConfig, setupNotFoundHandler } from '#logging';
import { CredentialProxy } from '#oauth/proxy/credential-proxy';
import { registerProxyRoutes } from '#oauth/proxy/routes';
import { registerManagementRoutes } from '#routes/management';
import { registerSessionRoutes } from '#routes/session';
import { registerUtilityRoutes } from '#routes/utility';
import { createScopeResolver } from '#scopes';
import { SessionBinding } from '#session/binding';
import { PeriodicTask } from '#sweeper';

import type { Clock, Log } from '@credgate/core';
import type { AuditLog } from '@credgate/session-security';
import type { FastifyInstance } from 'fastify';

import type { CredentialGateOptions } from '#config';
import type { SweepResult } from '#routes/management';

/**
 * picks the audit destination: an explicit sink, else a json lines file, else the log
 * @param options gate options
 * @returns audit log, or undefined to discard events
 */
function createAuditLog(options: CredentialGateOptions): AuditLog | undefined {
  if (options.auditLog) {
    return options.auditLog;
  }

  if (options.auditLogPath) {
    return new JsonlAuditLog(options.auditLogPath, options.log);
  }

  return options.log && createLogAuditLog(options.log);
}

/**
 * http server fronting an OAuth provider: issues proxy clients, binds the
 * resulting credentials to sessions and gates every credential access
 */
export class CredentialGateServer {
  #fastify: FastifyInstance;
  #options: CredentialGateOptions;
  #log?: Log;
  #now: Clock;
  #auditLog?: AuditLog;
  #manager: SessionSecurityManager;
  #store: CredentialStore;
  #proxy: CredentialProxy;
  #binding: SessionBinding;
  #sweeper: PeriodicTask;
  #started = false;

  /**
   * creates the server and registers every route
   * @param options gate options
   * @throws {Error} when the options are invalid
   */
  constructor(options: CredentialGateOptions) {
    validateConfig(options);

    const { provider, session, storage, proxy, log } = options;

    this.#options = options;
    this.#log = log;
    this.#now = options.now ?? Date.now;
    this.#auditLog = createAuditLog(options);

    this.#manager = new SessionSecurityManager({
      secret: session?.secret,
      sessionTimeoutMs: session?.timeoutMs,
      maxFailedAttempts: session?.maxFailedAttempts,
      rateLimitWindowMs: session?.rateLimitWindowMs,
      maxPrincipalsPerSession: session?.maxPrincipalsPerSession,
      auditLog: this.#auditLog,
      log,
      now: this.#now,
    });

    this.#store = new CredentialStore({
      mode: storage.mode,
      directory: storage.directory,
      encryptionKey: storage.encryptionKey,
      log,
      now: this.#now,
    });

    const scopeGroup = proxy?.defaultScopeGroup ?? DEFAULT_SCOPE_GROUP;
    const scopes = createScopeResolver(proxy?.scopeGroups)(scopeGroup);
    if (scopes.length === 0) {
      log?.('warn', 'default scope group resolves to no scopes', {
        scopeGroup,
      });
    }

    this.#proxy = new CredentialProxy({
      provider,
      defaults: {
        clientName: proxy?.defaultClientName,
        redirectUris: proxy?.defaultRedirectUris,
        scope: scopes.join(' '),
      },
      clientExpiryMs: proxy?.clientExpiryMs,
      upstreamTimeoutMs: proxy?.upstreamTimeoutMs,
      auditLog: this.#auditLog,
      log,
      now: this.#now,
    });

    this.#binding = new SessionBinding({
      manager: this.#manager,
      store: this.#store,
      proxy: this.#proxy,
      log,
      now: this.#now,
    });

    this.#sweeper = new PeriodicTask(
      'sweep',
      options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS,
      () => {
        this.sweep();
      },
      log,
    );

    this.#fastify = fastify({
      logger: createLoggerConfig(log),
    });

    this.#setupServer();
  }

  /** the underlying fastify instance, e.g. for `inject` */
  public get app(): FastifyInstance {
    return this.#fastify;
  }

  /** the session security manager */
  public get manager(): SessionSecurityManager {
    return this.#manager;
  }

  /** the credential store */
  public get store(): CredentialStore {
    return this.#store;
  }

  /** the credential proxy */
  public get proxy(): CredentialProxy {
    return this.#proxy;
  }

  /**
   * removes expired sessions and proxy clients
   * @returns what was removed
   */
  public sweep(): SweepResult {
    return {
      sessionsCleanedUp: this.#manager.cleanupExpiredSessions(),
      proxyClientsExpired: this.#proxy.sweepExpiredClients(),
    };
  }

  /**
   * starts listening and schedules the periodic sweep
   * @throws {Error} when server is already started or fails to bind to port
   */
  public async start(): Promise<void> {
    if (this.#started) {
      throw new Error(
        'credgate server already started. Call stop() before starting again.',
      );
    }

    const port = this.#options.port ?? DEFAULT_HTTP_PORT;
    const host = this.#options.host ?? DEFAULT_HOST;

    try {
      await this.#fastify.listen({ port, host });
      this.#started = true;
    } catch (error) {
      throw new Error(
        `Failed to start HTTP server on ${host}:${port}: ${
          error instanceof Error ? error.message : 'Unknown server start error'
        }. Check if port is available and host is valid.`,
        { cause: error },
      );
    }

    this.#sweeper.start();

    this.#log?.('info', 'credgate server started', {
      host,
      port,
      storageMode: this.#store.mode,
      endpoints: {
        register: `http://${host}:${port}/oauth/register`,
        authorize: `http://${host}:${port}/oauth/authorize`,
        token: `http://${host}:${port}/oauth/token`,
        health: `http://${host}:${port}/health`,
      },
    });
  }

  /**
   * stops the sweep, the server and the audit log
   * @throws {Error} when server shutdown fails
   */
  public async stop(): Promise<void> {
    await this.#sweeper.stop();

    try {
      await this.#fastify.close();
    } catch (error) {
      throw new Error(
        `Failed to stop HTTP server: ${
          error instanceof Error ? error.message : 'Unknown shutdown error'
        }`,
        { cause: error },
      );
    }

    await this.#auditLog?.close?.();

    if (this.#started) {
      this.#started = false;
      this.#log?.('info', 'credgate server stopped');
    }
  }

  /** sets up fastify server with all routes and handlers */
  #setupServer(): void {
    const { provider, proxy } = this.#options;

    // setup error handling before any route plugin loads
    setupErrorHandler(this.#fastify, this.#log);
    setupNotFoundHandler(this.#fastify);

    // register form parser for OAuth endpoints
    void this.#fastify.register(formbody);

    // setup routes
    void this.#fastify.register(registerUtilityRoutes(this.#now));

    void this.#fastify.register(
      registerProxyRoutes({
        proxy: this.#proxy,
        binding: this.#binding,
        baseUrl: this.#options.baseUrl,
        tokenUri: provider.tokenEndpoint,
        principalLookup: {
          userinfoEndpoint: provider.userinfoEndpoint,
          timeoutMs: proxy?.upstreamTimeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS,
          log: this.#log,
        },
        log: this.#log,
        now: this.#now,
      }),
    );

    void this.#fastify.register(registerSessionRoutes(this.#binding, this.#now));

    void this.#fastify.register(
      registerManagementRoutes({
        manager: this.#manager,
        store: this.#store,
        proxy: this.#proxy,
        sweep: () => this.sweep(),
        managementToken: this.#options.managementToken,
        log: this.#log,
        now: this.#now,
      }),
    );
  }
}
