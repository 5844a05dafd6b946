import type { MarketSymbol, RawCandle, Timeframe } from '../market/candle.schema';

/**
 * Source of authoritative candle history for the sync.
 *
 * Implementations return raw candles; normalization (UTC, alignment, color)
 * happens in the sync core. Both methods may throw or return an empty array.
 */
export interface IMarketDataProvider {
  /** Most recent candle the provider has for the pair, or null */
  getLatestCandle(symbol: MarketSymbol, timeframe: Timeframe): Promise<RawCandle | null>;

  /** Full available history for the pair, in provider order */
  getHistory(symbol: MarketSymbol, timeframe: Timeframe): Promise<RawCandle[]>;
}
