/**
 * Timestamp Derivation
 * Layer: Application (transforms)
 *
 * Log events carry `ts` in epoch milliseconds. start_time is that instant
 * truncated to whole seconds, and every calendar field is read in UTC —
 * never the host's local zone — so the same input produces the same `time`
 * table on any machine.
 *
 *   ts 1541990258796 → 2018-11-12T02:37:38Z → hour 2, day 12, week 46,
 *   month 11, year 2018
 */
import type { TimeRow } from '@domain/entities/TimeSlot';

const MS_PER_SECOND = 1000;
const MS_PER_DAY = 86_400_000;

export function toStartTime(ts: number): Date {
  return new Date(Math.floor(ts / MS_PER_SECOND) * MS_PER_SECOND);
}

export function decomposeStartTime(startTime: Date): TimeRow {
  return {
    start_time: startTime,
    hour: startTime.getUTCHours(),
    day: startTime.getUTCDate(),
    week: isoWeekOfYear(startTime),
    month: startTime.getUTCMonth() + 1,
    year: startTime.getUTCFullYear(),
  };
}

/**
 * ISO-8601 week number: weeks start on Monday and week 1 is the week that
 * contains the year's first Thursday.
 */
export function isoWeekOfYear(date: Date): number {
  const day = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  // Monday = 1 … Sunday = 7
  const weekday = new Date(day).getUTCDay() || 7;
  const thursday = new Date(day + (4 - weekday) * MS_PER_DAY);
  const yearStart = Date.UTC(thursday.getUTCFullYear(), 0, 1);
  return Math.floor((thursday.getTime() - yearStart) / MS_PER_DAY / 7) + 1;
}
