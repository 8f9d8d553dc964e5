/**
 * Date utility functions for provider timestamps and lookback windows
 */

export const DAY_MS = 24 * 60 * 60 * 1000;
export const HOUR_MS = 60 * 60 * 1000;

const ISO_DATETIME_PATTERN =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?$/i;
const HAS_ZONE_PATTERN = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parse an ISO-like provider timestamp into a normalized UTC ISO string
 *
 * Timestamps without a zone designator are read as UTC.
 *
 * @returns ISO 8601 string, or null when the value is not a date-time
 */
export function parseAcquisitionTime(value: string): string | null {
  const trimmed = value.trim();
  if (!ISO_DATETIME_PATTERN.test(trimmed)) {
    return null;
  }

  const withZone = HAS_ZONE_PATTERN.test(trimmed) ? trimmed : `${trimmed}Z`;
  const ms = Date.parse(withZone);
  if (isNaN(ms)) {
    return null;
  }
  return new Date(ms).toISOString();
}

/**
 * Whole days between two instants, floored like a calendar timedelta
 * (-1.5 days → -2, 0.9 days → 0)
 */
export function wholeDaysBetween(later: Date, earlier: Date): number {
  return Math.floor((later.getTime() - earlier.getTime()) / DAY_MS);
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}

/**
 * Compact local timestamp used in run summary file names (YYYYMMDD_HHMMSS)
 */
export function formatRunTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
