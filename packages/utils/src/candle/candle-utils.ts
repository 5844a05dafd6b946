import type { CandleColor } from '@candle-sync/schemas';

/**
 * Classify a candle by direction: green when it closed above its open,
 * red below, doji when equal.
 */
export function computeCandleColor(open: number, close: number): CandleColor {
  if (close > open) {
    return 'green';
  }
  if (close < open) {
    return 'red';
  }
  return 'doji';
}

/**
 * True when two prices differ by at most the threshold (inclusive)
 */
export function isCloseEnough(a: number, b: number, threshold: number): boolean {
  return Math.abs(a - b) <= threshold;
}
