import { describe, expect, it, vi } from 'vitest';
import type { Candle } from '@candle-sync/schemas';
import { InMemoryCandleStore, storedCandle } from '../__tests__/fakes';
import { preferStored, type MismatchPolicy } from '../policies';
import { BoundaryReconciler, mismatchThreshold } from './boundary-reconciler';

const T = Date.UTC(2025, 2, 26);
const pair = { symbol: 'es', timeframe: '1d' } as const;
const ref = { namespace: 'fronttest', ...pair } as const;

function setup(storedClose: number, policy?: MismatchPolicy) {
  const store = new InMemoryCandleStore();
  store.seed(ref, [storedCandle('es', '1d', T, { open: 5000, close: storedClose, volume: 1200 })]);
  return { store, reconciler: new BoundaryReconciler(store, policy) };
}

function fetchedSeries(close: number): Candle[] {
  return [
    storedCandle('es', '1d', T - 86_400_000, { open: 4990, close: 5000 }),
    storedCandle('es', '1d', T, { open: 5000, close, volume: 1500 }),
    storedCandle('es', '1d', T + 86_400_000, { open: 5001, close: 5002 }),
  ];
}

describe('mismatchThreshold', () => {
  it('uses the per-symbol table and a default', () => {
    expect(mismatchThreshold('es')).toBe(0.25);
    expect(mismatchThreshold('eurusd')).toBe(0.0005);
    expect(mismatchThreshold('spy')).toBe(0.1);
    expect(
      mismatchThreshold('spy', { namespace: 'fronttest', mismatchThresholds: {}, defaultMismatchThreshold: 0.01 })
    ).toBe(0.01);
  });
});

describe('BoundaryReconciler', () => {
  it('does nothing without a stored latest timestamp', async () => {
    const { reconciler } = setup(5000);
    const fetched = fetchedSeries(5000);
    const output = await reconciler.reconcile(pair, fetched, null);
    expect(output.result).toEqual({ decision: 'not-checked' });
    expect(output.candles).toBe(fetched);
  });

  it('does nothing when the fetched series lacks the boundary timestamp', async () => {
    const { reconciler } = setup(5000);
    const output = await reconciler.reconcile(pair, fetchedSeries(5000), T + 3600_000);
    expect(output.result).toEqual({ decision: 'not-checked' });
  });

  it('accepts a difference within the threshold', async () => {
    const { reconciler } = setup(5000.1);
    const output = await reconciler.reconcile(pair, fetchedSeries(5000.2), T);
    expect(output.result).toEqual({ decision: 'match', timestamp: T, threshold: 0.25 });
  });

  it('keeps the provider values by default on a mismatch', async () => {
    const { reconciler } = setup(5000.5);
    const fetched = fetchedSeries(5000);
    const output = await reconciler.reconcile(pair, fetched, T);
    expect(output.result).toEqual({
      decision: 'mismatch-keep-provider',
      timestamp: T,
      threshold: 0.25,
      stored: { open: 5000, close: 5000.5 },
      provider: { open: 5000, close: 5000 },
    });
    expect(output.candles).toBe(fetched);
  });

  it('writes the stored values back when the stored side wins', async () => {
    const { reconciler } = setup(5000.5, preferStored);
    const fetched = fetchedSeries(5000);
    const output = await reconciler.reconcile(pair, fetched, T);

    expect(output.result.decision).toBe('mismatch-keep-stored');
    expect(output.candles[1]).toEqual({
      symbol: 'es',
      timeframe: '1d',
      timestamp: T,
      open: 5000,
      high: 5000.5,
      low: 5000,
      close: 5000.5,
      volume: 1200,
      candleColor: 'green',
    });
    expect(output.candles[0]).toBe(fetched[0]);
    expect(output.candles[2]).toBe(fetched[2]);
    expect(fetched[1].close).toBe(5000);
  });

  it('hands the policy both candles and the threshold', async () => {
    const policy = vi.fn<MismatchPolicy>(() => 'keep-provider');
    const { reconciler } = setup(5000.5, policy);
    await reconciler.reconcile(pair, fetchedSeries(5000), T);
    expect(policy).toHaveBeenCalledWith(
      expect.objectContaining({
        pair,
        timestamp: T,
        threshold: 0.25,
        stored: expect.objectContaining({ close: 5000.5 }),
        provider: expect.objectContaining({ close: 5000 }),
      })
    );
  });

  it('compares open as well as close', async () => {
    const store = new InMemoryCandleStore();
    store.seed(ref, [storedCandle('es', '1d', T, { open: 4999, close: 5000 })]);
    const output = await new BoundaryReconciler(store).reconcile(pair, fetchedSeries(5000), T);
    expect(output.result.decision).toBe('mismatch-keep-provider');
  });
});
