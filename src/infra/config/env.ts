/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Database
  DATABASE_URL: Type.String({ minLength: 1 }),
  DATABASE_POOL_MAX: Type.Integer({ default: 10, minimum: 1, maximum: 100 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  CLIENT_BASE_URL: Type.Optional(Type.String()),

  // Auth (HMAC-signed JWT)
  AUTH_JWT_SECRET: Type.Optional(Type.String({ minLength: 1 })),
  AUTH_JWT_ALGORITHM: Type.Union(
    [Type.Literal('HS256'), Type.Literal('HS384'), Type.Literal('HS512')],
    { default: 'HS256' }
  ),
  AUTH_JWT_ISSUER: Type.Optional(Type.String()),
  AUTH_JWT_AUDIENCE: Type.Optional(Type.String()),

  // Fact appends
  APPEND_MAX_ATTEMPTS: Type.Integer({ default: 5, minimum: 1, maximum: 50 }),
  APPEND_RETRY_DELAY_MS: Type.Integer({ default: 25, minimum: 0, maximum: 5000 }),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (raw: string | undefined, fallback: number): number => {
  return raw != null && raw !== '' ? Number.parseInt(raw, 10) : fallback;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseInteger(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    DATABASE_POOL_MAX: parseInteger(env['DATABASE_POOL_MAX'], 10),
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    CLIENT_BASE_URL: env['CLIENT_BASE_URL'],
    AUTH_JWT_SECRET: env['AUTH_JWT_SECRET'],
    AUTH_JWT_ALGORITHM: env['AUTH_JWT_ALGORITHM'] ?? 'HS256',
    AUTH_JWT_ISSUER: env['AUTH_JWT_ISSUER'],
    AUTH_JWT_AUDIENCE: env['AUTH_JWT_AUDIENCE'],
    APPEND_MAX_ATTEMPTS: parseInteger(env['APPEND_MAX_ATTEMPTS'], 5),
    APPEND_RETRY_DELAY_MS: parseInteger(env['APPEND_RETRY_DELAY_MS'], 25),
  };

  // Optional keys that are unset must be absent, not undefined
  const cleaned = Object.fromEntries(
    Object.entries(rawEnv).filter(([, value]) => value !== undefined)
  );

  // Validate against schema
  if (!Value.Check(EnvSchema, cleaned)) {
    const errors = [...Value.Errors(EnvSchema, cleaned)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return cleaned;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
    poolMax: env.DATABASE_POOL_MAX,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
    clientBaseUrl: env.CLIENT_BASE_URL,
  },
  auth: {
    /** Shared HMAC secret used to verify bearer tokens */
    jwtSecret: env.AUTH_JWT_SECRET,
    jwtAlgorithm: env.AUTH_JWT_ALGORITHM,
    jwtIssuer: env.AUTH_JWT_ISSUER,
    jwtAudience: env.AUTH_JWT_AUDIENCE,
    /** Whether auth is enabled (true if a secret is set) */
    enabled: env.AUTH_JWT_SECRET !== undefined,
  },
  facts: {
    /** Compare-and-swap attempts before an append gives up with BusyError */
    appendMaxAttempts: env.APPEND_MAX_ATTEMPTS,
    /** Base delay between append attempts; multiplied by the attempt number */
    appendRetryDelayMs: env.APPEND_RETRY_DELAY_MS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
