/**
 * Schema health checker
 *
 * Confirms the users table carries every column the fact ledger writes.
 * A database migrated without them would accept reads but fail every append.
 */

import { sql, type Kysely } from 'kysely';

import { withTimeout } from './timeout.js';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

const DEFAULT_TIMEOUT_MS = 3000;

/** Columns the ledger reads and writes on the users table */
export const LEDGER_COLUMNS = [
  'facts_learned',
  'current_streak',
  'longest_streak',
  'total_facts_count',
  'last_activity_date',
  'version',
] as const;

export interface SchemaHealthCheckerOptions {
  name: string;
  /** @default 'users' */
  table?: string;
  /** @default LEDGER_COLUMNS */
  columns?: readonly string[];
  timeoutMs?: number;
}

/**
 * Lists which of `required` are absent from `present`, in `required` order.
 */
export const findMissingColumns = (
  required: readonly string[],
  present: readonly string[]
): string[] => {
  const found = new Set(present);
  return required.filter((column) => !found.has(column));
};

export const makeSchemaHealthChecker = <T>(
  db: Kysely<T>,
  options: SchemaHealthCheckerOptions
): HealthChecker => {
  const {
    name,
    table = 'users',
    columns = LEDGER_COLUMNS,
    timeoutMs = DEFAULT_TIMEOUT_MS,
  } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();

    if (columns.length === 0) {
      return { name, status: 'healthy', latencyMs: 0, critical: true };
    }

    try {
      const result = await withTimeout(
        sql<{ column_name: string }>`
          SELECT column_name
          FROM information_schema.columns
          WHERE table_schema = current_schema()
            AND table_name = ${table}
            AND column_name IN (${sql.join([...columns])})
        `.execute(db),
        timeoutMs,
        'Schema health check'
      );

      const missing = findMissingColumns(
        columns,
        result.rows.map((row) => row.column_name)
      );
      const latencyMs = Date.now() - startTime;

      if (missing.length > 0) {
        return {
          name,
          status: 'unhealthy',
          message: `Table "${table}" is missing columns: ${missing.join(', ')}`,
          latencyMs,
          critical: true,
        };
      }

      return { name, status: 'healthy', latencyMs, critical: true };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown schema check error',
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    }
  };
};
