/**
 * Get Stats Use Case
 *
 * Reports the caller's streak counters and how many facts they learned this week.
 */

import { err, ok, type Result } from 'neverthrow';

import { deserializeLedger } from '../ledger.js';
import { aggregateStats } from '../stats.js';
import { authorizeUser } from './authorize-user.js';

import type { LearningFactsError } from '../errors.js';
import type { Clock, UserFactsRepository } from '../ports.js';
import type { StatsView } from '../types.js';

export interface GetStatsDeps {
  repo: UserFactsRepository;
  clock: Clock;
}

export interface GetStatsInput {
  userId: number;
  callerUsername: string;
}

/**
 * Reads the caller's stats. Counters are reported as stored, with nulls as 0;
 * the weekly count is derived from the ledger on every call.
 */
export async function getStats(
  deps: GetStatsDeps,
  input: GetStatsInput
): Promise<Result<StatsView, LearningFactsError>> {
  const { repo, clock } = deps;

  const userResult = await authorizeUser({ repo }, input);
  if (userResult.isErr()) {
    return err(userResult.error);
  }

  const user = userResult.value;
  return ok(aggregateStats(deserializeLedger(user.factsLearned), user, clock.today()));
}
