/**
 * Database health checker
 *
 * Runs `SELECT 1` against the pool. Unhealthy on error or timeout.
 */

import { sql, type Kysely } from 'kysely';

import { withTimeout } from './timeout.js';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

const DEFAULT_TIMEOUT_MS = 3000;

export interface DbHealthCheckerOptions {
  /** Name to identify this database in health check results */
  name: string;
  /** Timeout in milliseconds (default: 3000) */
  timeoutMs?: number;
}

/**
 * @example
 * const dbChecker = makeDbHealthChecker(userDb, { name: 'database' });
 * // { name: 'database', status: 'healthy', latencyMs: 5, critical: true }
 */
export const makeDbHealthChecker = <T>(
  db: Kysely<T>,
  options: DbHealthCheckerOptions
): HealthChecker => {
  const { name, timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();

    try {
      await withTimeout(sql`SELECT 1`.execute(db), timeoutMs, 'Database health check');
      return { name, status: 'healthy', latencyMs: Date.now() - startTime, critical: true };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown database error',
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    }
  };
};
