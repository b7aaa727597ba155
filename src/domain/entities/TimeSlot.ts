/**
 * Row of the `time` dimension, keyed by start_time.
 *
 * Every calendar field is derived from start_time in UTC; `week` is the
 * ISO-8601 week of the year (1–53), so early-January dates can belong to
 * week 52/53 of the previous ISO year.
 */
export interface TimeRow {
  start_time: Date;
  hour: number;
  day: number;
  week: number;
  month: number;
  year: number;
}
