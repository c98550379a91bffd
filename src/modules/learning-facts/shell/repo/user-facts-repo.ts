/**
 * User Facts Repository - Kysely Implementation
 *
 * Implements the UserFactsRepository interface using Kysely.
 * The fact list is kept as a JSON text blob on the user row; appends
 * are guarded by the row's `version` column.
 */

import { sql } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import { createStorageFailureError, type LearningFactsError } from '../../core/errors.js';

import type { UserFactsRepository } from '../../core/ports.js';
import type { UserLedgerRecord, UserLedgerUpdate } from '../../core/types.js';
import type { UserDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for creating the repository.
 */
export interface UserFactsRepoOptions {
  db: UserDbClient;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyUserFactsRepo implements UserFactsRepository {
  private readonly db: UserDbClient;
  private readonly log: Logger;

  constructor(options: UserFactsRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'user-facts-repo' });
  }

  async getUserById(userId: number): Promise<Result<UserLedgerRecord | null, LearningFactsError>> {
    try {
      const row = await this.db
        .selectFrom('users')
        .select([
          'id',
          'username',
          'facts_learned',
          'current_streak',
          'longest_streak',
          'total_facts_count',
          'version',
          sql<string | null>`last_activity_date::text`.as('last_activity_date'),
        ])
        .where('id', '=', userId)
        .executeTakeFirst();

      if (row === undefined) {
        return ok(null);
      }

      return ok({
        id: row.id,
        username: row.username,
        factsLearned: row.facts_learned,
        currentStreak: row.current_streak,
        longestStreak: row.longest_streak,
        totalFactsCount: row.total_facts_count,
        lastActivityDate: row.last_activity_date,
        version: row.version,
      });
    } catch (error) {
      this.log.error({ err: error, userId }, 'Failed to read user ledger');
      return err(createStorageFailureError('Failed to read user ledger', error));
    }
  }

  async updateUserFields(
    userId: number,
    fields: UserLedgerUpdate,
    expectedVersion: number
  ): Promise<Result<boolean, LearningFactsError>> {
    try {
      // Single statement: either every ledger column moves together or none does
      const result = await this.db
        .updateTable('users')
        .set({
          facts_learned: fields.factsLearned,
          total_facts_count: fields.totalFactsCount,
          current_streak: fields.currentStreak,
          longest_streak: fields.longestStreak,
          last_activity_date: fields.lastActivityDate,
          version: sql<number>`version + 1`,
        })
        .where('id', '=', userId)
        .where('version', '=', expectedVersion)
        .executeTakeFirst();

      const applied = result.numUpdatedRows > 0n;
      if (!applied) {
        this.log.debug({ userId, expectedVersion }, 'Ledger update lost version race');
      }
      return ok(applied);
    } catch (error) {
      this.log.error({ err: error, userId }, 'Failed to update user ledger');
      return err(createStorageFailureError('Failed to update user ledger', error));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a user facts repository.
 */
export const makeUserFactsRepo = (options: UserFactsRepoOptions): UserFactsRepository => {
  return new KyselyUserFactsRepo(options);
};
