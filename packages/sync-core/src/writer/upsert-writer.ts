import type { Candle, CandleTableRef, ICandleStore } from '@candle-sync/schemas';
import { createLogger } from '@candle-sync/utils';
import { StoreWriteError } from '../errors';
import { collapseDuplicateTimestamps } from '../normalizer';

const logger = createLogger('sync:writer');

/**
 * Single write path into the candle store. Every call is one store
 * transaction keyed by (symbol, timestamp); the last write for a key wins.
 */
export class UpsertWriter {
  constructor(private readonly store: ICandleStore) {}

  /**
   * @param operation - Step doing the write, carried on failures
   * @returns Rows written
   */
  async write(ref: CandleTableRef, candles: readonly Candle[], operation: string): Promise<number> {
    if (candles.length === 0) {
      return 0;
    }

    const foreign = candles.find((c) => c.symbol !== ref.symbol || c.timeframe !== ref.timeframe);
    if (foreign) {
      throw new StoreWriteError(ref, operation, {
        cause: new Error(`candle for ${foreign.symbol} ${foreign.timeframe} does not belong in this table`),
      });
    }

    const unique = collapseDuplicateTimestamps(candles);
    try {
      const written = await this.store.upsertCandles(ref, unique);
      logger.debug(
        { namespace: ref.namespace, symbol: ref.symbol, timeframe: ref.timeframe, operation, written },
        `Upserted ${written} candles`
      );
      return written;
    } catch (cause) {
      throw new StoreWriteError(ref, operation, { cause });
    }
  }
}
