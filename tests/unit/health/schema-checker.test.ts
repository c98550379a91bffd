/**
 * Unit tests for the users table schema checker
 */

import { describe, it, expect } from 'vitest';

import {
  findMissingColumns,
  makeSchemaHealthChecker,
  LEDGER_COLUMNS,
} from '@/modules/health/shell/checkers/schema-checker.js';

import { makeFakeKyselyDb } from '../../fixtures/fake-db.js';

describe('findMissingColumns', () => {
  it('returns nothing when every column is present', () => {
    expect(findMissingColumns(LEDGER_COLUMNS, [...LEDGER_COLUMNS].reverse())).toEqual([]);
  });

  it('lists absent columns in required order', () => {
    expect(
      findMissingColumns(LEDGER_COLUMNS, ['facts_learned', 'current_streak', 'longest_streak'])
    ).toEqual(['total_facts_count', 'last_activity_date', 'version']);
  });
});

describe('makeSchemaHealthChecker', () => {
  it('queries information_schema for the table and columns', async () => {
    const { db, queries } = makeFakeKyselyDb();
    const checker = makeSchemaHealthChecker(db, {
      name: 'users-schema',
      columns: ['facts_learned', 'version'],
    });

    await checker();

    expect(queries).toHaveLength(1);
    expect(queries[0]?.sql).toContain('information_schema.columns');
    expect(queries[0]?.sql).toContain('WHERE table_schema = current_schema()');
    expect(queries[0]?.parameters).toEqual(['users', 'facts_learned', 'version']);
  });

  it('is unhealthy when columns are missing', async () => {
    // The fake returns no rows, so every column reads as absent
    const { db } = makeFakeKyselyDb();
    const checker = makeSchemaHealthChecker(db, {
      name: 'users-schema',
      table: 'members',
      columns: ['facts_learned', 'version'],
    });

    const result = await checker();

    expect(result).toMatchObject({
      name: 'users-schema',
      status: 'unhealthy',
      message: 'Table "members" is missing columns: facts_learned, version',
      critical: true,
    });
  });

  it('is healthy when every column is reported', async () => {
    const { db } = makeFakeKyselyDb({
      rows: [{ column_name: 'version' }, { column_name: 'facts_learned' }],
    });
    const checker = makeSchemaHealthChecker(db, {
      name: 'users-schema',
      columns: ['facts_learned', 'version'],
    });

    const result = await checker();

    expect(result).toMatchObject({ name: 'users-schema', status: 'healthy', critical: true });
  });

  it('is healthy without a query when no columns are required', async () => {
    const { db, queries } = makeFakeKyselyDb();
    const checker = makeSchemaHealthChecker(db, { name: 'users-schema', columns: [] });

    const result = await checker();

    expect(result.status).toBe('healthy');
    expect(queries).toHaveLength(0);
  });

  it('reports query failures', async () => {
    const { db } = makeFakeKyselyDb({ failWithError: new Error('permission denied') });
    const checker = makeSchemaHealthChecker(db, { name: 'users-schema' });

    const result = await checker();

    expect(result.status).toBe('unhealthy');
    expect(result.message).toBe('permission denied');
  });
});
