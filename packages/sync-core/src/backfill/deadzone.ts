import { SECOND_MS } from '@candle-sync/utils';
import type { Deadzone } from './types';

/**
 * Gap between stored and fetched data, or null when the fetched series
 * reaches back to (or before) the newest stored candle.
 */
export function detectDeadzone(storedLatest: number | null, fetchedOldest: number | null): Deadzone | null {
  if (storedLatest === null || fetchedOldest === null || fetchedOldest <= storedLatest) {
    return null;
  }

  return {
    storedLatest,
    fetchedOldest,
    gapStart: storedLatest + SECOND_MS,
    gapEnd: fetchedOldest - SECOND_MS,
  };
}
