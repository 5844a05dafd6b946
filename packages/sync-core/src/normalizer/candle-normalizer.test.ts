import { describe, it, expect } from 'vitest';
import type { AlignmentRules, RawCandle } from '@candle-sync/schemas';
import { CandleNormalizationError } from '../errors';
import {
  alignTimestamp,
  collapseDuplicateTimestamps,
  normalizeCandle,
  normalizeCandles,
  normalizeVolume,
  toUtcMs,
} from './candle-normalizer';

const raw = (timestamp: RawCandle['timestamp'], overrides: Partial<RawCandle> = {}): RawCandle => ({
  timestamp,
  open: 100,
  high: 101,
  low: 99,
  close: 100.5,
  volume: 10,
  ...overrides,
});

describe('toUtcMs', () => {
  const expected = Date.UTC(2025, 2, 26, 8, 0, 0);

  it('reads naive strings as UTC', () => {
    expect(toUtcMs('2025-03-26 08:00:00')).toBe(expected);
    expect(toUtcMs('2025-03-26T08:00:00')).toBe(expected);
  });

  it('converts zoned strings', () => {
    expect(toUtcMs('2025-03-26T08:00:00Z')).toBe(expected);
    expect(toUtcMs('2025-03-26T10:00:00+02:00')).toBe(expected);
    expect(toUtcMs('2025-03-26T03:00:00-05:00')).toBe(expected);
  });

  it('accepts date-only strings, numbers and dates', () => {
    expect(toUtcMs('2025-03-26')).toBe(Date.UTC(2025, 2, 26));
    expect(toUtcMs(expected)).toBe(expected);
    expect(toUtcMs(new Date(expected))).toBe(expected);
  });

  it('rejects unparseable values', () => {
    expect(() => toUtcMs('not a date')).toThrow(CandleNormalizationError);
    expect(() => toUtcMs(Number.NaN)).toThrow('Invalid candle timestamp: NaN');
  });
});

describe('alignTimestamp', () => {
  const providerDaily = Date.UTC(2025, 2, 26, 4, 0, 0);

  it('anchors spy daily bars at 14:30 UTC', () => {
    expect(alignTimestamp(providerDaily, 'spy', '1d')).toBe(Date.UTC(2025, 2, 26, 14, 30));
  });

  it('anchors other daily bars at midnight UTC', () => {
    expect(alignTimestamp(providerDaily, 'es', '1d')).toBe(Date.UTC(2025, 2, 26));
    expect(alignTimestamp(providerDaily, 'eurusd', '1d')).toBe(Date.UTC(2025, 2, 26));
  });

  it('shifts eurusd 5m bars forward five hours', () => {
    expect(alignTimestamp(Date.UTC(2025, 2, 26, 8, 0), 'eurusd', '5m')).toBe(Date.UTC(2025, 2, 26, 13, 0));
  });

  it('leaves intraday bars of other pairs alone', () => {
    const ts = Date.UTC(2025, 2, 26, 8, 5);
    expect(alignTimestamp(ts, 'eurusd', '1m')).toBe(ts);
    expect(alignTimestamp(ts, 'es', '5m')).toBe(ts);
    expect(alignTimestamp(ts, 'spy', '1h')).toBe(ts);
  });

  it('follows injected rules', () => {
    const rules: AlignmentRules = {
      defaultDailyAnchor: { hour: 22, minute: 0 },
      dailyAnchors: {},
      shifts: [{ symbol: 'es', timeframe: '1h', offsetMs: -60_000 }],
    };
    expect(alignTimestamp(providerDaily, 'spy', '1d', rules)).toBe(Date.UTC(2025, 2, 26, 22, 0));
    expect(alignTimestamp(Date.UTC(2025, 2, 26, 9), 'es', '1h', rules)).toBe(Date.UTC(2025, 2, 26, 8, 59));
  });
});

describe('normalizeVolume', () => {
  it('maps missing and non-numeric volume to zero', () => {
    expect(normalizeVolume(undefined)).toBe(0);
    expect(normalizeVolume(null)).toBe(0);
    expect(normalizeVolume(Number.NaN)).toBe(0);
  });

  it('truncates and clamps', () => {
    expect(normalizeVolume(12.9)).toBe(12);
    expect(normalizeVolume(-5)).toBe(0);
  });
});

describe('normalizeCandle', () => {
  it('builds the canonical candle', () => {
    const candle = normalizeCandle(raw(Date.UTC(2025, 2, 26, 8, 0, 0) + 750, { volume: null }), 'es', '1m');
    expect(candle).toEqual({
      symbol: 'es',
      timeframe: '1m',
      timestamp: Date.UTC(2025, 2, 26, 8, 0, 0),
      open: 100,
      high: 101,
      low: 99,
      close: 100.5,
      volume: 0,
      candleColor: 'green',
    });
  });

  it('derives color only from open and close', () => {
    expect(normalizeCandle(raw(0, { close: 99.5 }), 'es', '1m').candleColor).toBe('red');
    expect(normalizeCandle(raw(0, { close: 100 }), 'es', '1m').candleColor).toBe('doji');
  });

  it('skips alignment when told to', () => {
    const ts = Date.UTC(2025, 2, 26, 4, 0);
    expect(normalizeCandle(raw(ts), 'spy', '1d', null).timestamp).toBe(ts);
  });

  it('rejects non-numeric prices', () => {
    expect(() => normalizeCandle(raw(0, { high: Number.NaN }), 'spy', '5m')).toThrow(CandleNormalizationError);
  });
});

describe('normalizeCandles', () => {
  it('returns candles oldest first', () => {
    const candles = normalizeCandles([raw(3000), raw(1000), raw(2000)], 'es', '1m');
    expect(candles.map((c) => c.timestamp)).toEqual([1000, 2000, 3000]);
  });
});

describe('collapseDuplicateTimestamps', () => {
  it('keeps the later entry for a repeated timestamp', () => {
    const [first, second] = normalizeCandles([raw(1000, { close: 90 }), raw(1000, { close: 110 })], 'es', '1m');
    const collapsed = collapseDuplicateTimestamps([first, second]);
    expect(collapsed).toHaveLength(1);
    expect(collapsed[0].close).toBe(110);
  });
});
