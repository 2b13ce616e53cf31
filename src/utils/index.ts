/**
 * Utility functions
 */

/**
 * Slack timestamps: decimal seconds since epoch, e.g. "1706745600.000200"
 */
export const TIMESTAMP_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Convert a string-encoded epoch timestamp to seconds
 */
export function parseTimestamp(ts: string): number {
  return Number(ts);
}

/**
 * Numeric comparison of two string-encoded timestamps
 */
export function compareTimestamps(a: string, b: string): number {
  return parseTimestamp(a) - parseTimestamp(b);
}

/**
 * Convert a string-encoded epoch timestamp to a Date
 */
export function timestampToDate(ts: string): Date {
  return new Date(parseTimestamp(ts) * 1000);
}

/**
 * Format a timestamp as "YYYY-MM-DD HH:MM:SS UTC" (sub-second part dropped)
 */
export function formatUtcTimestamp(ts: string): string {
  const iso = timestampToDate(ts).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

/**
 * Describe the runtime type of a JSON value for error messages
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
