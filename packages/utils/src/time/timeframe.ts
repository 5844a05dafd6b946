export const SECOND_MS = 1000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Truncate a millisecond timestamp to whole seconds
 */
export function truncateToSecond(timestamp: number): number {
  return Math.floor(timestamp / SECOND_MS) * SECOND_MS;
}

/**
 * Midnight UTC of the calendar date the timestamp falls on
 */
export function startOfUtcDay(timestamp: number): number {
  return Math.floor(timestamp / DAY_MS) * DAY_MS;
}

/**
 * Format timestamp for status output, e.g. '2025-01-01 00:00:00 UTC'
 */
export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, ' UTC');
}
