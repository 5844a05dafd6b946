import type { CandleNamespace, Timeframe } from '@candle-sync/schemas';

/**
 * Inclusive range between the newest stored candle and the oldest fetched one
 */
export interface Deadzone {
  storedLatest: number;
  fetchedOldest: number;
  gapStart: number;
  gapEnd: number;
}

export type BackfillResult =
  | { status: 'unsupported-timeframe' }
  | { status: 'declined' }
  | { status: 'empty-range' }
  | { status: 'no-secondary-data' }
  | { status: 'secondary-unavailable'; error: string }
  | { status: 'filled'; found: number; written: number };

export interface BackfillOptions {
  namespace: CandleNamespace;
  /** The only timeframe the secondary store can fill */
  backfillTimeframe: Timeframe;
}
