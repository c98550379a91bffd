/**
 * Learning Facts Module - Streak Engine
 *
 * Advances a user's streak counters by one day of activity.
 * Pure function; the caller supplies "today".
 */

import { addDays, parseCalendarDate } from './calendar.js';

import type { CalendarDate, StoredStreak, StreakState } from './types.js';

/**
 * Computes the streak state after recording activity on `today`.
 *
 * - No (or an unreadable) previous activity date starts a streak of 1.
 * - Activity earlier the same day keeps the current streak, never below 1.
 * - Activity yesterday extends the streak by one.
 * - Anything else, including a date after today, restarts at 1.
 */
export function computeNewStreak(previous: StoredStreak, today: CalendarDate): StreakState {
  const currentStreak = previous.currentStreak ?? 0;
  const longestStreak = previous.longestStreak ?? 0;

  // Malformed stored dates read as "never active"
  const lastActivityDate = parseCalendarDate(previous.lastActivityDate);

  let newCurrent: number;
  if (lastActivityDate === null) {
    newCurrent = 1;
  } else if (lastActivityDate === today) {
    newCurrent = Math.max(currentStreak, 1);
  } else if (lastActivityDate === addDays(today, -1)) {
    newCurrent = currentStreak + 1;
  } else {
    newCurrent = 1;
  }

  return {
    currentStreak: newCurrent,
    longestStreak: Math.max(longestStreak, newCurrent),
    lastActivityDate: today,
  };
}
