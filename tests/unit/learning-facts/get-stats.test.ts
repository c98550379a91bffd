/**
 * Get Stats Use Case Tests
 */

import { describe, it, expect } from 'vitest';

import { getStats } from '@/modules/learning-facts/core/usecases/get-stats.js';

import {
  createStoredFact,
  makeFakeUserFactsRepo,
  makeFixedClock,
  storedLedger,
} from '../../fixtures/fakes.js';

describe('getStats', () => {
  it('reports stored counters and the facts of the last seven days', async () => {
    const repo = makeFakeUserFactsRepo({
      users: [
        {
          id: 1,
          username: 'alice',
          currentStreak: 2,
          longestStreak: 6,
          totalFactsCount: 2,
          lastActivityDate: '2024-03-09',
          factsLearned: storedLedger([
            // 8 days before
            createStoredFact({ learned_at: '2024-03-02T10:00:00Z' }),
            // 6 days before
            createStoredFact({ learned_at: '2024-03-04T10:00:00Z' }),
          ]),
        },
      ],
    });
    const clock = makeFixedClock('2024-03-10T15:00:00Z');

    const result = await getStats({ repo, clock }, { userId: 1, callerUsername: 'alice' });

    expect(result._unsafeUnwrap()).toEqual({
      currentStreak: 2,
      longestStreak: 6,
      totalFactsCount: 2,
      factsThisWeek: 1,
      lastActivityDate: '2024-03-09',
    });
  });

  it('does not decay the stored streak when read later', async () => {
    const repo = makeFakeUserFactsRepo({
      users: [
        { id: 1, username: 'alice', currentStreak: 4, longestStreak: 4, lastActivityDate: '2024-02-01' },
      ],
    });
    const clock = makeFixedClock('2024-03-10T15:00:00Z');

    const stats = (
      await getStats({ repo, clock }, { userId: 1, callerUsername: 'alice' })
    )._unsafeUnwrap();

    expect(stats.currentStreak).toBe(4);
  });

  it('reports null counters as zero', async () => {
    const repo = makeFakeUserFactsRepo({
      users: [
        {
          id: 1,
          username: 'alice',
          currentStreak: null,
          longestStreak: null,
          totalFactsCount: null,
        },
      ],
    });
    const clock = makeFixedClock('2024-03-10T15:00:00Z');

    const result = await getStats({ repo, clock }, { userId: 1, callerUsername: 'alice' });

    expect(result._unsafeUnwrap()).toEqual({
      currentStreak: 0,
      longestStreak: 0,
      totalFactsCount: 0,
      factsThisWeek: 0,
      lastActivityDate: null,
    });
  });

  it('has no side effects on the stored row', async () => {
    const repo = makeFakeUserFactsRepo({ users: [{ id: 1, username: 'alice' }] });
    const clock = makeFixedClock('2024-03-10T15:00:00Z');

    await getStats({ repo, clock }, { userId: 1, callerUsername: 'alice' });

    expect(repo.updateCalls).toBe(0);
    expect(repo.getRow(1)?.version).toBe(0);
  });

  it('returns ForbiddenError for another user', async () => {
    const repo = makeFakeUserFactsRepo({ users: [{ id: 1, username: 'alice' }] });
    const clock = makeFixedClock('2024-03-10T15:00:00Z');

    const result = await getStats({ repo, clock }, { userId: 1, callerUsername: 'bob' });

    expect(result._unsafeUnwrapErr().type).toBe('ForbiddenError');
  });

  it('returns NotFoundError for an unknown user', async () => {
    const repo = makeFakeUserFactsRepo();
    const clock = makeFixedClock('2024-03-10T15:00:00Z');

    const result = await getStats({ repo, clock }, { userId: 1, callerUsername: 'alice' });

    expect(result._unsafeUnwrapErr().type).toBe('NotFoundError');
  });
});
