/**
 * Learning Facts Module - Stats Aggregator
 *
 * Builds the reporting view from stored counters plus a fresh pass over the ledger.
 */

import { addDays, parseFactTimestamp, toCalendarDate } from './calendar.js';
import {
  WEEK_WINDOW_DAYS,
  type CalendarDate,
  type FactEntry,
  type StatsView,
  type StoredStreak,
} from './types.js';

/**
 * Stored counters the aggregator passes through.
 */
export interface StoredCounters extends StoredStreak {
  totalFactsCount: number | null;
}

/**
 * Counts entries learned within the `days`-day window ending on `referenceToday`,
 * both ends inclusive. Entries with unreadable timestamps are not counted.
 */
export function countFactsInWindow(
  ledger: readonly FactEntry[],
  referenceToday: CalendarDate,
  days: number = WEEK_WINDOW_DAYS
): number {
  const windowStart = addDays(referenceToday, -(days - 1));

  let count = 0;
  for (const entry of ledger) {
    const epoch = parseFactTimestamp(entry.learnedAt);
    if (epoch === null) {
      continue;
    }
    const learnedOn = toCalendarDate(new Date(epoch));
    if (learnedOn >= windowStart && learnedOn <= referenceToday) {
      count += 1;
    }
  }
  return count;
}

/**
 * Aggregates a user's stats view.
 */
export function aggregateStats(
  ledger: readonly FactEntry[],
  counters: StoredCounters,
  referenceToday: CalendarDate
): StatsView {
  return {
    currentStreak: counters.currentStreak ?? 0,
    longestStreak: counters.longestStreak ?? 0,
    totalFactsCount: counters.totalFactsCount ?? 0,
    factsThisWeek: countFactsInWindow(ledger, referenceToday),
    lastActivityDate: counters.lastActivityDate,
  };
}
