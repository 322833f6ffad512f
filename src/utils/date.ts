/**
 * Date utility functions for summaries and dead-letter timestamps.
 *
 * @module utils/date
 */

const ZONELESS_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/**
 * `2025-03-01T10:00:00` has no zone and would be read as local time.
 * Such values are taken as UTC; anything else is returned unchanged.
 */
function assumeUtc(value: string): string {
  const match = ZONELESS_DATE_TIME.exec(value);
  return match ? `${match[1]}T${match[2]}Z` : value;
}

/**
 * Format a wire date as `YYYY-MM-DD HH:mm` (UTC).
 *
 * Scrapers send ISO strings, sometimes without a zone; those are read as
 * UTC. Unparseable values and placeholder dates in year 1 are treated as
 * absent.
 *
 * @param value - Date string from the tender payload
 * @returns Formatted date, or null if the value is missing or invalid
 */
export function formatDateTime(value: string | null | undefined): string | null {
  if (!value) return null;
  const date = new Date(assumeUtc(value.trim()));
  if (Number.isNaN(date.getTime()) || date.getUTCFullYear() <= 1) {
    return null;
  }
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  const hours = String(date.getUTCHours()).padStart(2, '0');
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}`;
}

/**
 * Current time as an ISO-8601 string.
 * @param now - Clock (defaults to Date.now)
 */
export function isoNow(now: () => number = Date.now): string {
  return new Date(now()).toISOString();
}
