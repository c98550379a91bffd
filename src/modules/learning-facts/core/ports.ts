/**
 * Learning Facts Module - Ports (Interfaces)
 *
 * What the core needs from the outside world: a user store and a clock.
 */

import type { LearningFactsError } from './errors.js';
import type { CalendarDate, UserLedgerRecord, UserLedgerUpdate } from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Repository Interface
// ─────────────────────────────────────────────────────────────────────────────

/**
 * User store access for the ledger columns.
 * Each call is atomic on its own; nothing spans two calls.
 */
export interface UserFactsRepository {
  /**
   * Read one user row. Returns null if the user does not exist.
   */
  getUserById(userId: number): Promise<Result<UserLedgerRecord | null, LearningFactsError>>;

  /**
   * Write the ledger fields of one row if its version still equals `expectedVersion`,
   * bumping the version in the same statement.
   *
   * @returns true when the row was written, false when another writer got there first
   */
  updateUserFields(
    userId: number,
    fields: UserLedgerUpdate,
    expectedVersion: number
  ): Promise<Result<boolean, LearningFactsError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Clock Interface
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Source of "now" in the reference calendar (UTC).
 */
export interface Clock {
  now(): Date;
  today(): CalendarDate;
}
