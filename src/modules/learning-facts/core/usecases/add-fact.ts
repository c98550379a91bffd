/**
 * Add Fact Use Case
 *
 * Appends a fact to the caller's ledger and advances their streak.
 *
 * The read-modify-write runs as a compare-and-swap on the row version:
 * when another append lands between the read and the write, the whole
 * step is redone from a fresh read. After `maxAttempts` lost races the
 * append fails with a BusyError and nothing is written.
 */

import { setTimeout as sleep } from 'node:timers/promises';

import { ok, err, type Result } from 'neverthrow';

import { toCalendarDate } from '../calendar.js';
import { appendStoredFact, createFactEntry, toFactView } from '../ledger.js';
import { computeNewStreak } from '../streak.js';
import { createBusyError, type LearningFactsError } from '../errors.js';
import { authorizeUser } from './authorize-user.js';

import type { Clock, UserFactsRepository } from '../ports.js';
import type { FactView, NewFactInput } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Retry policy for lost compare-and-swap races.
 */
export interface AppendRetryPolicy {
  /** Total attempts, first one included */
  maxAttempts: number;
  /** Base delay; attempt n waits n × delayMs before retrying */
  delayMs: number;
}

export const DEFAULT_APPEND_RETRY: AppendRetryPolicy = {
  maxAttempts: 5,
  delayMs: 25,
};

export interface AddFactDeps {
  repo: UserFactsRepository;
  clock: Clock;
  retry?: AppendRetryPolicy;
}

export interface AddFactInput {
  userId: number;
  callerUsername: string;
  fact: NewFactInput;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Records a new fact for the caller.
 *
 * Order of checks: user exists, caller owns it, input is valid.
 * Storage failures are returned as-is and never retried here.
 *
 * @returns The appended fact as stored
 */
export async function addFact(
  deps: AddFactDeps,
  input: AddFactInput
): Promise<Result<FactView, LearningFactsError>> {
  const { repo, clock } = deps;
  const { maxAttempts, delayMs } = deps.retry ?? DEFAULT_APPEND_RETRY;
  const { userId, callerUsername, fact } = input;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const userResult = await authorizeUser({ repo }, { userId, callerUsername });
    if (userResult.isErr()) {
      return err(userResult.error);
    }
    const user = userResult.value;

    // One reading per attempt: the stamp and the streak day must agree
    const now = clock.now();

    const entryResult = createFactEntry(fact, now);
    if (entryResult.isErr()) {
      return err(entryResult.error);
    }
    const entry = entryResult.value;

    const factsResult = appendStoredFact(user.factsLearned, entry);
    if (factsResult.isErr()) {
      return err(factsResult.error);
    }

    const streak = computeNewStreak(user, toCalendarDate(now));

    const updateResult = await repo.updateUserFields(
      userId,
      {
        factsLearned: factsResult.value,
        totalFactsCount: (user.totalFactsCount ?? 0) + 1,
        currentStreak: streak.currentStreak,
        longestStreak: streak.longestStreak,
        lastActivityDate: streak.lastActivityDate,
      },
      user.version
    );
    if (updateResult.isErr()) {
      return err(updateResult.error);
    }

    if (updateResult.value) {
      return ok(toFactView(entry));
    }

    if (attempt < maxAttempts && delayMs > 0) {
      await sleep(delayMs * attempt);
    }
  }

  return err(createBusyError(maxAttempts));
}
