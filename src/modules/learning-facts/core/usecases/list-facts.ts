/**
 * List Facts Use Case
 *
 * Returns a page of the caller's facts, newest first.
 */

import { err, type Result } from 'neverthrow';

import {
  deserializeLedger,
  filterByCategory,
  paginate,
  sortByRecency,
  toFactView,
  validateLimit,
} from '../ledger.js';
import { DEFAULT_LIST_LIMIT, type FactPage, type FactView } from '../types.js';
import { authorizeUser } from './authorize-user.js';

import type { LearningFactsError } from '../errors.js';
import type { UserFactsRepository } from '../ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ListFactsDeps {
  repo: UserFactsRepository;
}

export interface ListFactsInput {
  userId: number;
  callerUsername: string;
  /** Page size, defaults to DEFAULT_LIST_LIMIT */
  limit?: number | undefined;
  /** Exact-match category filter; empty means no filter */
  category?: string | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Lists the caller's facts.
 *
 * The limit is checked before anything is read, so a bad limit never
 * touches storage. `total` counts the filtered list before truncation.
 */
export async function listFacts(
  deps: ListFactsDeps,
  input: ListFactsInput
): Promise<Result<FactPage<FactView>, LearningFactsError>> {
  const { repo } = deps;
  const { userId, callerUsername, category } = input;
  const limit = input.limit ?? DEFAULT_LIST_LIMIT;

  const limitResult = validateLimit(limit);
  if (limitResult.isErr()) {
    return err(limitResult.error);
  }

  const userResult = await authorizeUser({ repo }, { userId, callerUsername });
  if (userResult.isErr()) {
    return err(userResult.error);
  }

  const ledger = deserializeLedger(userResult.value.factsLearned);
  const sorted = sortByRecency(filterByCategory(ledger, category));

  return paginate(sorted, limitResult.value).map((page) => ({
    items: page.items.map(toFactView),
    total: page.total,
  }));
}
