export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;

/** An event "follows" a dosage when it occurs within this span after it. */
export const LOOKAHEAD_MS = 24 * HOUR_MS;

/** Fixed denominator for per-day dashboard averages. */
export const NORMALIZATION_DAYS = 30;

/** Trailing window for "recent" dashboard activity. */
export const RECENT_WINDOW_MS = 7 * DAY_MS;

/** Whole days spanned by [start, end], rounded up. */
export function periodDays(start: Date, end: Date): number {
  const span = end.getTime() - start.getTime();
  if (span <= 0) return 0;
  return Math.ceil(span / DAY_MS);
}
