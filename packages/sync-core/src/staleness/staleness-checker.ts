import {
  SYNC_CONFIG,
  type Candle,
  type ICandleStore,
  type IMarketDataProvider,
  type SyncPair,
} from '@candle-sync/schemas';
import { createLogger } from '@candle-sync/utils';
import { ProviderUnavailableError } from '../errors';
import { normalizeCandle } from '../normalizer';
import type { StalenessOptions, StalenessResult } from './types';

const logger = createLogger('sync:staleness');

export const DEFAULT_STALENESS_OPTIONS: StalenessOptions = {
  namespace: SYNC_CONFIG.targetNamespace,
  stalenessToleranceMs: SYNC_CONFIG.stalenessToleranceMs,
};

/**
 * Compares the provider's most recent candle with the newest stored one.
 *
 * Provider failures become a no-data result; store read failures propagate.
 */
export class StalenessChecker {
  private options: StalenessOptions;

  constructor(
    private readonly provider: IMarketDataProvider,
    private readonly store: ICandleStore,
    options: Partial<StalenessOptions> = {}
  ) {
    this.options = { ...DEFAULT_STALENESS_OPTIONS, ...options };
  }

  async check(pair: SyncPair): Promise<StalenessResult> {
    const latest = await this.fetchProviderLatest(pair);
    if (!latest) {
      return { status: 'no-data', reason: 'no-provider-data', storedLatest: null, providerLatest: null };
    }

    const storedLatest = await this.store.getLatestTimestamp({ namespace: this.options.namespace, ...pair });
    if (storedLatest === null) {
      return { status: 'no-data', reason: 'no-stored-data', storedLatest: null, providerLatest: latest.timestamp };
    }

    const differenceMs = Math.abs(latest.timestamp - storedLatest);
    const status = differenceMs <= this.options.stalenessToleranceMs ? 'up-to-date' : 'stale';

    logger.debug(
      { symbol: pair.symbol, timeframe: pair.timeframe, storedLatest, providerLatest: latest.timestamp, differenceMs },
      `${pair.symbol}_${pair.timeframe} is ${status}`
    );

    return { status, storedLatest, providerLatest: latest.timestamp, differenceMs };
  }

  private async fetchProviderLatest(pair: SyncPair): Promise<Candle | null> {
    try {
      const raw = await this.provider.getLatestCandle(pair.symbol, pair.timeframe);
      if (!raw) {
        logger.warn({ symbol: pair.symbol, timeframe: pair.timeframe }, 'Provider returned no recent candle');
        return null;
      }
      return normalizeCandle(raw, pair.symbol, pair.timeframe);
    } catch (cause) {
      const error = new ProviderUnavailableError(pair, 'fetch-latest', { cause });
      logger.warn(
        { symbol: pair.symbol, timeframe: pair.timeframe, operation: error.operation, error: error.message },
        'Could not read latest provider candle'
      );
      return null;
    }
  }
}
