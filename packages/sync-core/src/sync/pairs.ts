import { SYNC_CONFIG, type SyncConfig, type SyncPair } from '@candle-sync/schemas';

/**
 * Every configured (symbol, timeframe) pair, symbol by symbol
 */
export function configuredPairs(config: Pick<SyncConfig, 'symbols' | 'syncTimeframes'> = SYNC_CONFIG): SyncPair[] {
  return config.symbols.flatMap((symbol) => config.syncTimeframes.map((timeframe) => ({ symbol, timeframe })));
}
