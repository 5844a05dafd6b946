import {
  SYNC_CONFIG,
  type AlignmentRules,
  type Candle,
  type MarketSymbol,
  type RawCandle,
  type Timeframe,
} from '@candle-sync/schemas';
import { HOUR_MS, MINUTE_MS, computeCandleColor, startOfUtcDay, truncateToSecond } from '@candle-sync/utils';
import { CandleNormalizationError } from '../errors';

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Epoch milliseconds for a raw timestamp. Strings without a zone designator
 * are read as UTC.
 */
export function toUtcMs(timestamp: RawCandle['timestamp']): number {
  let value: number;
  if (typeof timestamp === 'number') {
    value = timestamp;
  } else if (timestamp instanceof Date) {
    value = timestamp.getTime();
  } else {
    const text = timestamp.trim().replace(' ', 'T');
    value = Date.parse(ZONE_SUFFIX.test(text) || DATE_ONLY.test(text) ? text : `${text}Z`);
  }

  if (!Number.isFinite(value)) {
    throw new CandleNormalizationError(`Invalid candle timestamp: ${String(timestamp)}`);
  }
  return value;
}

/**
 * Shift a UTC timestamp onto the grid the store uses for this symbol/timeframe.
 * Daily bars are anchored on their UTC calendar date; configured shifts are added.
 */
export function alignTimestamp(
  timestamp: number,
  symbol: MarketSymbol,
  timeframe: Timeframe,
  rules: AlignmentRules = SYNC_CONFIG.alignment
): number {
  let aligned = timestamp;

  if (timeframe === '1d') {
    const anchor = rules.dailyAnchors[symbol] ?? rules.defaultDailyAnchor;
    aligned = startOfUtcDay(aligned) + anchor.hour * HOUR_MS + anchor.minute * MINUTE_MS;
  }

  for (const shift of rules.shifts) {
    if (shift.symbol === symbol && shift.timeframe === timeframe) {
      aligned += shift.offsetMs;
    }
  }

  return aligned;
}

/**
 * Missing or non-numeric volume counts as zero
 */
export function normalizeVolume(volume: number | null | undefined): number {
  if (volume === null || volume === undefined || !Number.isFinite(volume)) {
    return 0;
  }
  return Math.max(0, Math.trunc(volume));
}

/**
 * Canonical candle for a raw provider/store row.
 *
 * Pass `alignment: null` for rows that are already on the store's grid
 * (dump documents).
 */
export function normalizeCandle(
  raw: RawCandle,
  symbol: MarketSymbol,
  timeframe: Timeframe,
  alignment: AlignmentRules | null = SYNC_CONFIG.alignment
): Candle {
  const { open, high, low, close } = raw;
  if (![open, high, low, close].every(Number.isFinite)) {
    throw new CandleNormalizationError(
      `Non-numeric price in ${symbol} ${timeframe} candle at ${String(raw.timestamp)}`
    );
  }

  const utc = truncateToSecond(toUtcMs(raw.timestamp));

  return {
    symbol,
    timeframe,
    timestamp: alignment ? alignTimestamp(utc, symbol, timeframe, alignment) : utc,
    open,
    high,
    low,
    close,
    volume: normalizeVolume(raw.volume),
    candleColor: computeCandleColor(open, close),
  };
}

/**
 * Normalize a batch, returned oldest first
 */
export function normalizeCandles(
  raws: readonly RawCandle[],
  symbol: MarketSymbol,
  timeframe: Timeframe,
  alignment: AlignmentRules | null = SYNC_CONFIG.alignment
): Candle[] {
  return raws
    .map((raw) => normalizeCandle(raw, symbol, timeframe, alignment))
    .sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * One candle per timestamp, the later entry winning, oldest first
 */
export function collapseDuplicateTimestamps(candles: readonly Candle[]): Candle[] {
  const byTimestamp = new Map<number, Candle>();
  for (const candle of candles) {
    byTimestamp.set(candle.timestamp, candle);
  }
  return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
}
