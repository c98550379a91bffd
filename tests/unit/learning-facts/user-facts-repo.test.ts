/**
 * User Facts Repository Tests
 *
 * Runs the Kysely repository against the in-process database stand-in
 * and checks the SQL it issues.
 */

import pinoLogger from 'pino';
import { describe, it, expect } from 'vitest';

import { makeUserFactsRepo } from '@/modules/learning-facts/shell/repo/user-facts-repo.js';

import { makeFakeKyselyDb } from '../../fixtures/fake-db.js';

import type { UserDatabase } from '@/infra/database/user/types.js';
import type { UserLedgerUpdate } from '@/modules/learning-facts/core/types.js';

const testLogger = pinoLogger({ level: 'silent' });

const UPDATE: UserLedgerUpdate = {
  factsLearned: '[]',
  totalFactsCount: 3,
  currentStreak: 2,
  longestStreak: 4,
  lastActivityDate: '2024-03-10',
};

describe('makeUserFactsRepo', () => {
  describe('getUserById', () => {
    it('returns null when no row matches', async () => {
      const { db, queries } = makeFakeKyselyDb<UserDatabase>();
      const repo = makeUserFactsRepo({ db, logger: testLogger });

      const result = await repo.getUserById(5);

      expect(result._unsafeUnwrap()).toBeNull();
      expect(queries[0]?.parameters).toEqual([5]);
    });

    it('maps every column of a found row', async () => {
      const { db } = makeFakeKyselyDb<UserDatabase>({
        rows: [
          {
            id: 5,
            username: 'alice',
            facts_learned: '[{"content":"a"}]',
            current_streak: 2,
            longest_streak: 9,
            total_facts_count: 14,
            version: 3,
            last_activity_date: null,
          },
        ],
      });
      const repo = makeUserFactsRepo({ db, logger: testLogger });

      const result = await repo.getUserById(5);

      expect(result._unsafeUnwrap()).toEqual({
        id: 5,
        username: 'alice',
        factsLearned: '[{"content":"a"}]',
        currentStreak: 2,
        longestStreak: 9,
        totalFactsCount: 14,
        lastActivityDate: null,
        version: 3,
      });
    });

    it('reads the activity date as text', async () => {
      const { db, queries } = makeFakeKyselyDb<UserDatabase>();
      const repo = makeUserFactsRepo({ db, logger: testLogger });

      await repo.getUserById(5);

      expect(queries[0]?.sql).toContain('last_activity_date::text as "last_activity_date"');
    });

    it('returns StorageFailureError when the query fails', async () => {
      const { db } = makeFakeKyselyDb<UserDatabase>({
        failWithError: new Error('connection reset'),
      });
      const repo = makeUserFactsRepo({ db, logger: testLogger });

      const result = await repo.getUserById(5);

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'StorageFailureError',
        message: 'Failed to read user ledger',
      });
    });
  });

  describe('updateUserFields', () => {
    it('guards the write on the expected version and bumps it', async () => {
      const { db, queries } = makeFakeKyselyDb<UserDatabase>({ numAffectedRows: 1n });
      const repo = makeUserFactsRepo({ db, logger: testLogger });

      const result = await repo.updateUserFields(5, UPDATE, 7);

      expect(result._unsafeUnwrap()).toBe(true);
      expect(queries[0]?.sql).toContain('"version" = version + 1');
      expect(queries[0]?.sql).toContain('where "id" = $6 and "version" = $7');
      expect(queries[0]?.parameters).toEqual(['[]', 3, 2, 4, '2024-03-10', 5, 7]);
    });

    it('reports a lost race when no row was updated', async () => {
      const { db } = makeFakeKyselyDb<UserDatabase>({ numAffectedRows: 0n });
      const repo = makeUserFactsRepo({ db, logger: testLogger });

      const result = await repo.updateUserFields(5, UPDATE, 7);

      expect(result._unsafeUnwrap()).toBe(false);
    });

    it('returns StorageFailureError when the write fails', async () => {
      const { db } = makeFakeKyselyDb<UserDatabase>({ failWithError: new Error('disk full') });
      const repo = makeUserFactsRepo({ db, logger: testLogger });

      const result = await repo.updateUserFields(5, UPDATE, 7);

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'StorageFailureError',
        message: 'Failed to update user ledger',
      });
    });
  });
});
