/**
 * Authorize User Use Case
 *
 * Access guard shared by every ledger entry point: the caller may only
 * touch the user row whose username matches their own.
 */

import { ok, err, type Result } from 'neverthrow';

import { createForbiddenError, createNotFoundError, type LearningFactsError } from '../errors.js';

import type { UserFactsRepository } from '../ports.js';
import type { UserLedgerRecord } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface AuthorizeUserDeps {
  repo: UserFactsRepository;
}

export interface AuthorizeUserInput {
  /** Target user row */
  userId: number;
  /** Authenticated caller's username */
  callerUsername: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Loads the target user and checks the caller owns it.
 *
 * @returns The loaded row, which the caller then works from
 */
export async function authorizeUser(
  deps: AuthorizeUserDeps,
  input: AuthorizeUserInput
): Promise<Result<UserLedgerRecord, LearningFactsError>> {
  const { repo } = deps;
  const { userId, callerUsername } = input;

  const userResult = await repo.getUserById(userId);
  if (userResult.isErr()) {
    return err(userResult.error);
  }

  const user = userResult.value;
  if (user === null) {
    return err(createNotFoundError(userId));
  }

  if (user.username !== callerUsername) {
    return err(createForbiddenError(userId));
  }

  return ok(user);
}
