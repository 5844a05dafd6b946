import type { Candle, IMarketDataProvider, SyncPair } from '@candle-sync/schemas';
import { createLogger } from '@candle-sync/utils';
import { ProviderUnavailableError } from '../errors';
import { collapseDuplicateTimestamps, normalizeCandles } from '../normalizer';

const logger = createLogger('sync');

/**
 * Full provider history for a pair, normalized and oldest first.
 * Returns an empty list when the provider has nothing or fails.
 */
export class HistoryFetcher {
  constructor(private readonly provider: IMarketDataProvider) {}

  async fetch(pair: SyncPair): Promise<Candle[]> {
    let candles: Candle[];
    try {
      const raws = await this.provider.getHistory(pair.symbol, pair.timeframe);
      candles = collapseDuplicateTimestamps(normalizeCandles(raws, pair.symbol, pair.timeframe));
    } catch (cause) {
      const error = new ProviderUnavailableError(pair, 'fetch-history', { cause });
      logger.warn(
        { symbol: pair.symbol, timeframe: pair.timeframe, operation: error.operation, error: error.message },
        'Could not fetch provider history'
      );
      return [];
    }

    if (candles.length === 0) {
      logger.warn({ symbol: pair.symbol, timeframe: pair.timeframe }, 'Provider returned no history');
      return [];
    }

    logger.debug(
      { symbol: pair.symbol, timeframe: pair.timeframe, count: candles.length },
      `Fetched ${candles.length} candles`
    );
    return candles;
  }
}
