import type { CandleNamespace } from '@candle-sync/schemas';

export type StalenessResult =
  | {
      status: 'up-to-date' | 'stale';
      storedLatest: number;
      providerLatest: number;
      /** Absolute provider vs store difference in ms */
      differenceMs: number;
    }
  | {
      status: 'no-data';
      reason: 'no-provider-data' | 'no-stored-data';
      storedLatest: number | null;
      providerLatest: number | null;
    };

export interface StalenessOptions {
  namespace: CandleNamespace;
  /** Largest difference still reported as up to date (inclusive) */
  stalenessToleranceMs: number;
}
