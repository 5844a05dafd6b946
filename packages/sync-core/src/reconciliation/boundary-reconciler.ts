import { SYNC_CONFIG, type Candle, type ICandleStore, type MarketSymbol, type SyncPair } from '@candle-sync/schemas';
import { computeCandleColor, createLogger, isCloseEnough } from '@candle-sync/utils';
import { preferProvider, type MismatchPolicy } from '../policies';
import type { ReconcilerOptions, ReconciliationOutput } from './types';

const logger = createLogger('sync:reconcile');

export const DEFAULT_RECONCILER_OPTIONS: ReconcilerOptions = {
  namespace: SYNC_CONFIG.targetNamespace,
  mismatchThresholds: SYNC_CONFIG.mismatchThresholds,
  defaultMismatchThreshold: SYNC_CONFIG.defaultMismatchThreshold,
};

export function mismatchThreshold(symbol: MarketSymbol, options: ReconcilerOptions = DEFAULT_RECONCILER_OPTIONS): number {
  return options.mismatchThresholds[symbol] ?? options.defaultMismatchThreshold;
}

/**
 * Checks the fetched candle sitting on the newest stored timestamp against
 * the stored row. Only that one timestamp is ever compared or changed.
 */
export class BoundaryReconciler {
  private options: ReconcilerOptions;

  constructor(
    private readonly store: ICandleStore,
    private readonly policy: MismatchPolicy = preferProvider,
    options: Partial<ReconcilerOptions> = {}
  ) {
    this.options = { ...DEFAULT_RECONCILER_OPTIONS, ...options };
  }

  async reconcile(pair: SyncPair, fetched: Candle[], storedLatest: number | null): Promise<ReconciliationOutput> {
    const index = storedLatest === null ? -1 : fetched.findIndex((c) => c.timestamp === storedLatest);
    if (storedLatest === null || index === -1) {
      return { result: { decision: 'not-checked' }, candles: fetched };
    }

    const stored = await this.store.getCandleAt({ namespace: this.options.namespace, ...pair }, storedLatest);
    if (!stored) {
      return { result: { decision: 'not-checked' }, candles: fetched };
    }

    const provider = fetched[index];
    const threshold = mismatchThreshold(pair.symbol, this.options);
    const log = { symbol: pair.symbol, timeframe: pair.timeframe, timestamp: storedLatest, threshold };

    if (isCloseEnough(stored.open, provider.open, threshold) && isCloseEnough(stored.close, provider.close, threshold)) {
      logger.debug(log, 'Boundary candle matches');
      return { result: { decision: 'match', timestamp: storedLatest, threshold }, candles: fetched };
    }

    const resolution = await this.policy({ pair, timestamp: storedLatest, stored, provider, threshold });
    const snapshots = {
      stored: { open: stored.open, close: stored.close },
      provider: { open: provider.open, close: provider.close },
    };
    logger.info({ ...log, ...snapshots, resolution }, 'Boundary candle mismatch');

    if (resolution === 'keep-provider') {
      return {
        result: { decision: 'mismatch-keep-provider', timestamp: storedLatest, threshold, ...snapshots },
        candles: fetched,
      };
    }

    const kept: Candle = {
      ...provider,
      open: stored.open,
      high: stored.high,
      low: stored.low,
      close: stored.close,
      volume: stored.volume,
      candleColor: computeCandleColor(stored.open, stored.close),
    };
    const candles = fetched.map((candle, i) => (i === index ? kept : candle));
    return {
      result: { decision: 'mismatch-keep-stored', timestamp: storedLatest, threshold, ...snapshots },
      candles,
    };
  }
}
