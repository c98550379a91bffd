import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { UserDatabase } from './user/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type UserDbClient = Kysely<UserDatabase>;

/**
 * Create the Kysely instance for the user database.
 *
 * The returned handle owns a connection pool; callers close it with `destroy()`.
 */
export const initDatabase = (config: AppConfig): UserDbClient => {
  const { url, poolMax } = config.database;

  if (url === '') {
    throw new Error('Missing configuration for User Database (DATABASE_URL)');
  }

  return new Kysely<UserDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString: url,
        max: poolMax,
      }),
    }),
  });
};

export type { Users, UserDatabase } from './user/types.js';
