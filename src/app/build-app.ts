/**
 * Fastify application factory
 * Composition root: wires config, storage, auth and module routes together.
 */

import fastifyLib, {
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
} from 'fastify';

import { createLogger, type Logger } from '../infra/logger/index.js';
import { registerCors } from '../infra/plugins/cors.js';
import { ANONYMOUS_SESSION, makeAuthMiddleware, type AuthProvider } from '../modules/auth/index.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import {
  makeLearningFactsRoutes,
  makeSystemClock,
  makeUserFactsRepo,
  type Clock,
  type UserFactsRepository,
} from '../modules/learning-facts/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { UserDbClient } from '../infra/database/client.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  /** User database; owned by the app once passed in and destroyed on close */
  userDb?: UserDbClient;
  /** Overrides the Kysely repository (tests pass an in-memory one) */
  userFactsRepo?: UserFactsRepository;
  clock?: Clock;
  /**
   * Verifies bearer tokens. Without one every request is anonymous and
   * ledger routes answer 401.
   */
  authProvider?: AuthProvider;
  healthCheckers?: HealthChecker[];
  /** Logger handed to repositories; defaults to one built from config */
  logger?: Logger;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.config === undefined) {
    throw new Error('Missing required dependency: config');
  }
  const config = deps.config;

  const userFactsRepo =
    deps.userFactsRepo ??
    (deps.userDb !== undefined
      ? makeUserFactsRepo({
          db: deps.userDb,
          logger: deps.logger ?? createLogger({ level: config.logger.level, pretty: false }),
        })
      : undefined);

  if (userFactsRepo === undefined) {
    throw new Error('Missing required dependency: userDb or userFactsRepo');
  }

  const app = fastifyLib({
    ...fastifyOptions,
  });

  if (deps.userDb !== undefined) {
    const userDb = deps.userDb;
    app.addHook('onClose', async () => {
      await userDb.destroy();
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Error Handling
  // Must precede the route plugins
  // ─────────────────────────────────────────────────────────────────────────────
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.statusCode === 400 ? 'ValidationError' : 'RequestError',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Unhandled request error');
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  await registerCors(app, config);

  // ─────────────────────────────────────────────────────────────────────────────
  // Authentication
  // ─────────────────────────────────────────────────────────────────────────────
  if (deps.authProvider !== undefined) {
    app.addHook('preHandler', makeAuthMiddleware({ authProvider: deps.authProvider }));
  } else {
    app.log.warn('No auth provider configured; protected routes will answer 401');
    app.addHook('preHandler', (request, _reply, done) => {
      request.auth = ANONYMOUS_SESSION;
      done();
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Routes
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: deps.healthCheckers ?? [],
    })
  );

  await app.register(
    makeLearningFactsRoutes({
      userFactsRepo,
      clock: deps.clock ?? makeSystemClock(),
      appendRetry: {
        maxAttempts: config.facts.appendMaxAttempts,
        delayMs: config.facts.appendRetryDelayMs,
      },
    })
  );

  return app;
};

/**
 * Build app and wait for every plugin to load
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
