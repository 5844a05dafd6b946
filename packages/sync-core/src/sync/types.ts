import type { CandleNamespace, MarketSymbol, SyncPair, Timeframe } from '@candle-sync/schemas';
import type { BackfillResult, Deadzone } from '../backfill/types';
import type { ReconciliationResult } from '../reconciliation/types';
import type { StalenessResult } from '../staleness/types';

export type ScanRow =
  | { pair: SyncPair; staleness: StalenessResult }
  | { pair: SyncPair; staleness: null; error: string };

export type PairOutcome =
  | {
      pair: SyncPair;
      status: 'updated';
      /** Rows written by the full-series upsert */
      written: number;
      oldest: number;
      newest: number;
      reconciliation: ReconciliationResult;
      deadzone: Deadzone | null;
      backfill: BackfillResult | null;
    }
  | { pair: SyncPair; status: 'skipped'; reason: 'no-provider-data' | 'declined' }
  | { pair: SyncPair; status: 'failed'; operation: string; error: string };

export interface SyncReport {
  scanned: ScanRow[];
  outcomes: PairOutcome[];
}

export interface SyncOptions {
  namespace: CandleNamespace;
  /** Pairs processed at once; steps inside a pair always run in order */
  concurrency: number;
  stalenessToleranceMs: number;
  mismatchThresholds: Partial<Record<MarketSymbol, number>>;
  defaultMismatchThreshold: number;
  backfillTimeframe: Timeframe;
}

export interface RunHooks {
  /** Called once the scan is done, before any pair is updated */
  onScan?: (rows: ScanRow[]) => void;
}
