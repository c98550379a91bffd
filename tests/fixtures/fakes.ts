/**
 * Test fakes
 * In-memory stand-ins for the learning facts ports
 */

import { ok, err, type Result } from 'neverthrow';

import { toCalendarDate } from '@/modules/learning-facts/core/calendar.js';
import {
  createStorageFailureError,
  type LearningFactsError,
} from '@/modules/learning-facts/core/errors.js';

import type { Clock, UserFactsRepository } from '@/modules/learning-facts/core/ports.js';
import type {
  StoredFactRow,
  UserLedgerRecord,
  UserLedgerUpdate,
} from '@/modules/learning-facts/core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// User Facts Repository
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Seed row; ledger columns default to the state of a freshly registered user.
 */
export type FakeUserSeed = Pick<UserLedgerRecord, 'id' | 'username'> &
  Partial<Omit<UserLedgerRecord, 'id' | 'username'>>;

export interface FakeUserFactsRepoOptions {
  users?: FakeUserSeed[];
  /** Fail every read with a storage error */
  simulateReadError?: boolean;
  /** Fail every write with a storage error */
  simulateWriteError?: boolean;
  /** Report every write as a lost version race */
  simulateConflict?: boolean;
}

export interface FakeUserFactsRepo extends UserFactsRepository {
  /** Current stored row, for assertions */
  getRow(userId: number): UserLedgerRecord | undefined;
  /** Number of updateUserFields calls so far, applied or not */
  readonly updateCalls: number;
}

export const makeFakeUserFactsRepo = (options: FakeUserFactsRepoOptions = {}): FakeUserFactsRepo => {
  const store = new Map<number, UserLedgerRecord>();
  let updateCalls = 0;

  for (const seed of options.users ?? []) {
    store.set(seed.id, {
      factsLearned: null,
      currentStreak: 0,
      longestStreak: 0,
      totalFactsCount: 0,
      lastActivityDate: null,
      version: 0,
      ...seed,
    });
  }

  const createDbError = (): Result<never, LearningFactsError> =>
    err(createStorageFailureError('Simulated database error'));

  return {
    getUserById: async (userId: number) => {
      // Yield so concurrent callers interleave the way pool connections would
      await Promise.resolve();
      if (options.simulateReadError === true) return createDbError();

      const row = store.get(userId);
      return ok(row !== undefined ? { ...row } : null);
    },

    updateUserFields: async (
      userId: number,
      fields: UserLedgerUpdate,
      expectedVersion: number
    ): Promise<Result<boolean, LearningFactsError>> => {
      await Promise.resolve();
      updateCalls += 1;
      if (options.simulateWriteError === true) return createDbError();
      if (options.simulateConflict === true) return ok(false);

      const row = store.get(userId);
      if (row === undefined || row.version !== expectedVersion) {
        return ok(false);
      }

      store.set(userId, { ...row, ...fields, version: row.version + 1 });
      return ok(true);
    },

    getRow: (userId: number) => store.get(userId),

    get updateCalls() {
      return updateCalls;
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Clock
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeClock extends Clock {
  /** Moves the clock to another instant */
  set(iso: string): void;
}

/**
 * Clock pinned to an ISO instant until moved.
 */
export const makeFixedClock = (iso: string): FakeClock => {
  let current = new Date(iso);
  return {
    now: () => new Date(current.getTime()),
    today: () => toCalendarDate(current),
    set: (next: string) => {
      current = new Date(next);
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Test Data
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Stored fact row with defaults.
 */
export const createStoredFact = (overrides: Partial<StoredFactRow> = {}): StoredFactRow => ({
  content: 'Water boils at 100C at sea level',
  category: null,
  source_url: null,
  learned_at: '2024-03-10T09:00:00Z',
  ...overrides,
});

/**
 * Serialized ledger as it would sit in the facts_learned column.
 */
export const storedLedger = (rows: StoredFactRow[]): string => JSON.stringify(rows);
