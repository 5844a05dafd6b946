import type { Candle, CandleNamespace, MarketSymbol } from '@candle-sync/schemas';

export interface PriceSnapshot {
  open: number;
  close: number;
}

export type ReconciliationResult =
  | { decision: 'not-checked' }
  | { decision: 'match'; timestamp: number; threshold: number }
  | {
      decision: 'mismatch-keep-stored' | 'mismatch-keep-provider';
      timestamp: number;
      threshold: number;
      stored: PriceSnapshot;
      provider: PriceSnapshot;
    };

export interface ReconciliationOutput {
  result: ReconciliationResult;
  /** Fetched series, with the boundary candle replaced when the stored side won */
  candles: Candle[];
}

export interface ReconcilerOptions {
  namespace: CandleNamespace;
  mismatchThresholds: Partial<Record<MarketSymbol, number>>;
  defaultMismatchThreshold: number;
}
