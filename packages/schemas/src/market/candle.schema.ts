import { z } from 'zod';

/**
 * Symbols tracked by the sync. Each one owns a table per timeframe.
 */
export const MarketSymbolSchema = z.enum(['es', 'eurusd', 'spy']);
export type MarketSymbol = z.infer<typeof MarketSymbolSchema>;

/**
 * Timeframe enum - candle intervals with a table in the store
 *
 * 4h is loadable from dumps but not synced against the provider
 * (see SYNC_CONFIG.syncTimeframes).
 */
export const TimeframeSchema = z.enum([
  '1m',   // 1 minute
  '5m',   // 5 minutes
  '15m',  // 15 minutes
  '30m',  // 30 minutes
  '1h',   // 1 hour
  '4h',   // 4 hours
  '1d',   // 1 day
]);
export type Timeframe = z.infer<typeof TimeframeSchema>;

/**
 * Candle color, derived from open vs close
 */
export const CandleColorSchema = z.enum(['green', 'red', 'doji']);
export type CandleColor = z.infer<typeof CandleColorSchema>;

/**
 * Canonical candle record as stored in a candle table
 */
export const CandleSchema = z.object({
  symbol: MarketSymbolSchema,
  timeframe: TimeframeSchema,
  /** Unix timestamp in milliseconds (UTC, whole seconds) */
  timestamp: z.number().int().nonnegative(),
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  volume: z.number().int().nonnegative(),
  candleColor: CandleColorSchema,
});

/**
 * Candle as delivered by the provider or the secondary store, before
 * normalization. Timestamps may be epoch ms, a Date, or an ISO string with
 * or without a zone designator.
 */
export const RawCandleSchema = z.object({
  timestamp: z.union([z.number(), z.string().min(1), z.date()]),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nullable().optional(),
});

/**
 * A (symbol, timeframe) pair - the unit of sync work
 */
export const SyncPairSchema = z.object({
  symbol: MarketSymbolSchema,
  timeframe: TimeframeSchema,
});

export type Candle = z.infer<typeof CandleSchema>;
export type RawCandle = z.infer<typeof RawCandleSchema>;
export type SyncPair = z.infer<typeof SyncPairSchema>;
