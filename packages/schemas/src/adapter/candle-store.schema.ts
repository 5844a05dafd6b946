import type { CandleNamespace } from '../env/config.schema';
import {
  MarketSymbolSchema,
  TimeframeSchema,
  type Candle,
  type MarketSymbol,
  type RawCandle,
  type Timeframe,
} from '../market/candle.schema';

/**
 * Identifies one candle table: <namespace>.<symbol>_<timeframe>
 */
export interface CandleTableRef {
  namespace: CandleNamespace;
  symbol: MarketSymbol;
  timeframe: Timeframe;
}

/**
 * Parse a short table identifier such as 'eurusd_5m' into a ref.
 * Returns null unless both parts belong to the known symbol and timeframe sets.
 */
export function parseTableIdentifier(namespace: CandleNamespace, identifier: string): CandleTableRef | null {
  const separator = identifier.lastIndexOf('_');
  if (separator <= 0) {
    return null;
  }

  const symbol = MarketSymbolSchema.safeParse(identifier.slice(0, separator));
  const timeframe = TimeframeSchema.safeParse(identifier.slice(separator + 1));
  if (!symbol.success || !timeframe.success) {
    return null;
  }

  return { namespace, symbol: symbol.data, timeframe: timeframe.data };
}

/**
 * Persistence contract used by the sync core and the bulk loader.
 *
 * Tables are addressed by ref only; implementations resolve refs against a
 * closed set of known tables.
 */
export interface ICandleStore {
  /** Newest stored timestamp (ms) in the table, or null when empty */
  getLatestTimestamp(ref: CandleTableRef): Promise<number | null>;

  /** Stored candle at exactly this timestamp, or null */
  getCandleAt(ref: CandleTableRef, timestamp: number): Promise<Candle | null>;

  /**
   * Insert-or-update on (symbol, timestamp), all rows in one transaction.
   * @returns Number of rows written
   */
  upsertCandles(ref: CandleTableRef, candles: Candle[]): Promise<number>;

  /**
   * Rows of the secondary 1m table for a symbol with start <= timestamp <= end,
   * ascending.
   */
  getSecondaryRange(symbol: MarketSymbol, start: number, end: number): Promise<RawCandle[]>;
}
