const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Whole days from `now` until `target`, rounded down.
 * Negative once the target has passed.
 *
 * @example
 * ```typescript
 * daysUntil(new Date("2026-03-10T12:00:00Z"), new Date("2026-03-01T00:00:00Z")); // 9
 * ```
 */
export function daysUntil(target: Date, now: Date): number {
  return Math.floor((target.getTime() - now.getTime()) / MS_PER_DAY);
}

/**
 * End of a reservation term.
 *
 * @param start - Term start
 * @param durationSeconds - Term length in seconds (31536000 for one year)
 */
export function reservationEnd(start: Date, durationSeconds: number): Date {
  return new Date(start.getTime() + durationSeconds * 1000);
}

/**
 * Formats a Date object to YYYY-MM-DD string in UTC.
 *
 * @param date - Date to format
 * @returns Date string in YYYY-MM-DD format
 */
export function formatDateString(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Short month/day form used next to scheduled events, e.g. "3/7" (UTC).
 */
export function formatMonthDay(date: Date): string {
  return `${date.getUTCMonth() + 1}/${date.getUTCDate()}`;
}
