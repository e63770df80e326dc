/**
 * Export Date Ranges
 *
 * Exports can be limited to recent practice. Ranges are measured back from
 * "now" in local calendar terms: a month is 30 days, while the longer ranges
 * step back whole calendar months or years.
 */

import type { PracticeSession } from '../models';
import type { ExportDateRange } from './types';

/**
 * Earliest session date included by a range.
 *
 * @example
 * ```typescript
 * const now = new Date(2024, 5, 15, 12, 0);
 * rangeStartDate('week', now);        // 2024-06-08 12:00 local
 * rangeStartDate('threeMonths', now); // 2024-03-15 12:00 local
 * rangeStartDate('all', now);         // the earliest representable date
 * ```
 */
export function rangeStartDate(range: ExportDateRange, now: Date = new Date()): Date {
  const start = new Date(now.getTime());

  switch (range) {
    case 'week':
      start.setDate(start.getDate() - 7);
      return start;
    case 'month':
      start.setDate(start.getDate() - 30);
      return start;
    case 'threeMonths':
      start.setMonth(start.getMonth() - 3);
      return start;
    case 'sixMonths':
      start.setMonth(start.getMonth() - 6);
      return start;
    case 'year':
      start.setFullYear(start.getFullYear() - 1);
      return start;
    case 'all':
      return new Date(-8.64e15);
  }
}

/**
 * Sessions dated on or after the start of the range, newest first.
 * The input array is left untouched.
 */
export function filterSessionsByRange(
  sessions: readonly PracticeSession[],
  range: ExportDateRange,
  now: Date = new Date()
): PracticeSession[] {
  const start = rangeStartDate(range, now).getTime();
  return sessions
    .filter((session) => session.date.getTime() >= start)
    .sort((a, b) => b.date.getTime() - a.date.getTime());
}
