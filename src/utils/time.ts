/**
 * Time utilities
 *
 * The task database stores dates as days since 2001-01-01 and
 * timestamps as seconds since 2001-01-01T00:00:00Z.
 */

/** Seconds between the Unix epoch and 2001-01-01T00:00:00Z */
export const REFERENCE_EPOCH_OFFSET = 978_307_200;

const DAY_MS = 24 * 60 * 60 * 1000;
const REFERENCE_DATE_MS = Date.UTC(2001, 0, 1);

/**
 * Convert a database timestamp to an ISO string
 */
export function timestampToIso(seconds: number | null): string | null {
  if (seconds === null) {
    return null;
  }
  return new Date((seconds + REFERENCE_EPOCH_OFFSET) * 1000).toISOString();
}

/**
 * Convert a database day number to YYYY-MM-DD
 */
export function dayNumberToIsoDate(days: number | null): string | null {
  if (days === null) {
    return null;
  }
  return new Date(REFERENCE_DATE_MS + days * DAY_MS).toISOString().slice(0, 10);
}

/**
 * Convert YYYY-MM-DD to a database day number
 */
export function isoDateToDayNumber(date: string): number {
  const [year, month, day] = date.split('-').map(Number);
  return Math.round((Date.UTC(year, month - 1, day) - REFERENCE_DATE_MS) / DAY_MS);
}

/**
 * Today's local date as YYYY-MM-DD
 */
export function localToday(now: Date = new Date()): string {
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${now.getFullYear()}-${month}-${day}`;
}
