/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { jwtVerify } from 'jose';

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig, type AppConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { createLogger } from './infra/logger/index.js';
import { makeJWTAdapter, type AuthProvider } from './modules/auth/index.js';
import { makeDbHealthChecker, makeSchemaHealthChecker } from './modules/health/index.js';

import type { Logger } from 'pino';

const getVersion = (): string => process.env['APP_VERSION'] ?? '0.1.0';

/**
 * Creates the JWT auth provider when a signing secret is configured.
 */
const createAuthProvider = (config: AppConfig, logger: Logger): AuthProvider | undefined => {
  const { jwtSecret, jwtAlgorithm, jwtIssuer, jwtAudience } = config.auth;

  if (jwtSecret === undefined) {
    logger.warn('AUTH_JWT_SECRET not configured - authentication disabled');
    return undefined;
  }

  logger.info({ algorithm: jwtAlgorithm }, 'Creating JWT auth provider');

  return makeJWTAdapter({
    jwtVerify,
    secret: jwtSecret,
    algorithm: jwtAlgorithm,
    ...(jwtIssuer !== undefined && { issuer: jwtIssuer }),
    ...(jwtAudience !== undefined && { audience: jwtAudience }),
  });
};

const main = async (): Promise<void> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server, facts: config.facts } }, 'Starting API server');

  const userDb = initDatabase(config);
  const authProvider = createAuthProvider(config, logger);

  const app = await buildApp({
    fastifyOptions: {
      loggerInstance: logger,
      disableRequestLogging: false,
    },
    deps: {
      config,
      userDb,
      logger,
      healthCheckers: [
        makeDbHealthChecker(userDb, { name: 'database' }),
        makeSchemaHealthChecker(userDb, { name: 'users-schema' }),
      ],
      ...(authProvider !== undefined && { authProvider }),
    },
    version: getVersion(),
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      // onClose hooks release the database pool
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
