/**
 * System Clock
 *
 * Wall-clock implementation of the Clock port.
 */

import { toCalendarDate } from '../../core/calendar.js';

import type { Clock } from '../../core/ports.js';

export const makeSystemClock = (): Clock => ({
  now: () => new Date(),
  today: () => toCalendarDate(new Date()),
});
