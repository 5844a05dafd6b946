import { SYNC_CONFIG, type ICandleStore, type RawCandle, type SyncPair } from '@candle-sync/schemas';
import { createLogger, formatTimestamp } from '@candle-sync/utils';
import { describeCause } from '../errors';
import { normalizeCandles } from '../normalizer';
import { alwaysFill, type GapFillPolicy } from '../policies';
import type { UpsertWriter } from '../writer';
import type { BackfillOptions, BackfillResult, Deadzone } from './types';

const logger = createLogger('sync:backfill');

export const DEFAULT_BACKFILL_OPTIONS: BackfillOptions = {
  namespace: SYNC_CONFIG.targetNamespace,
  backfillTimeframe: SYNC_CONFIG.backfillTimeframe,
};

/**
 * Fills a deadzone from the secondary 1m store. Rows are written straight
 * away, ahead of the fetched series.
 */
export class GapBackfiller {
  private options: BackfillOptions;

  constructor(
    private readonly store: ICandleStore,
    private readonly writer: UpsertWriter,
    private readonly policy: GapFillPolicy = alwaysFill,
    options: Partial<BackfillOptions> = {}
  ) {
    this.options = { ...DEFAULT_BACKFILL_OPTIONS, ...options };
  }

  async fill(pair: SyncPair, deadzone: Deadzone): Promise<BackfillResult> {
    const context = {
      symbol: pair.symbol,
      timeframe: pair.timeframe,
      gapStart: formatTimestamp(deadzone.gapStart),
      gapEnd: formatTimestamp(deadzone.gapEnd),
    };

    if (pair.timeframe !== this.options.backfillTimeframe) {
      logger.warn(context, `Deadzone detected; only ${this.options.backfillTimeframe} can be backfilled`);
      return { status: 'unsupported-timeframe' };
    }

    if (!(await this.policy(pair, deadzone))) {
      logger.info(context, 'Deadzone fill declined');
      return { status: 'declined' };
    }

    if (deadzone.gapEnd <= deadzone.gapStart) {
      logger.debug(context, 'Deadzone range is empty');
      return { status: 'empty-range' };
    }

    let rows: RawCandle[];
    try {
      rows = await this.store.getSecondaryRange(pair.symbol, deadzone.gapStart, deadzone.gapEnd);
    } catch (cause) {
      const error = describeCause(cause);
      logger.warn({ ...context, operation: 'read-secondary', error }, 'Secondary store unavailable');
      return { status: 'secondary-unavailable', error };
    }

    if (rows.length === 0) {
      logger.info(context, 'No secondary data in deadzone');
      return { status: 'no-secondary-data' };
    }

    const candles = normalizeCandles(rows, pair.symbol, pair.timeframe);
    const written = await this.writer.write({ namespace: this.options.namespace, ...pair }, candles, 'gap-fill');

    logger.info({ ...context, found: rows.length, written }, `Filled deadzone with ${written} candles`);
    return { status: 'filled', found: rows.length, written };
  }
}
