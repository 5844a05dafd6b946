import {
  SYNC_CONFIG,
  type Candle,
  type CandleTableRef,
  type ICandleStore,
  type IMarketDataProvider,
  type SyncPair,
} from '@candle-sync/schemas';
import { createLogger } from '@candle-sync/utils';
import { GapBackfiller, detectDeadzone, type BackfillResult, type Deadzone } from '../backfill';
import { StoreWriteError, describeCause } from '../errors';
import { HistoryFetcher } from '../history';
import { DEFAULT_SYNC_POLICIES, type SyncPolicies } from '../policies';
import { BoundaryReconciler, type ReconciliationResult } from '../reconciliation';
import { StalenessChecker } from '../staleness';
import { UpsertWriter } from '../writer';
import type { PairOutcome, RunHooks, ScanRow, SyncOptions, SyncReport } from './types';

const logger = createLogger('sync');

export const DEFAULT_SYNC_OPTIONS: SyncOptions = {
  namespace: SYNC_CONFIG.targetNamespace,
  concurrency: 1,
  stalenessToleranceMs: SYNC_CONFIG.stalenessToleranceMs,
  mismatchThresholds: SYNC_CONFIG.mismatchThresholds,
  defaultMismatchThreshold: SYNC_CONFIG.defaultMismatchThreshold,
  backfillTimeframe: SYNC_CONFIG.backfillTimeframe,
};

export interface SyncServiceDeps {
  provider: IMarketDataProvider;
  store: ICandleStore;
  policies?: Partial<SyncPolicies>;
  options?: Partial<SyncOptions>;
}

/**
 * Brings candle tables up to date with the provider.
 *
 * Per pair: fetch history, reconcile the boundary candle, fill a 1m deadzone
 * from the secondary store, then upsert the whole series. A failing pair is
 * reported and the run moves on; nothing is retried.
 */
export class SyncService {
  private options: SyncOptions;
  private policies: SyncPolicies;
  private staleness: StalenessChecker;
  private history: HistoryFetcher;
  private reconciler: BoundaryReconciler;
  private backfiller: GapBackfiller;
  private writer: UpsertWriter;

  constructor(private readonly deps: SyncServiceDeps) {
    this.options = { ...DEFAULT_SYNC_OPTIONS, ...deps.options };
    this.policies = { ...DEFAULT_SYNC_POLICIES, ...deps.policies };

    const { namespace } = this.options;
    this.writer = new UpsertWriter(deps.store);
    this.staleness = new StalenessChecker(deps.provider, deps.store, {
      namespace,
      stalenessToleranceMs: this.options.stalenessToleranceMs,
    });
    this.history = new HistoryFetcher(deps.provider);
    this.reconciler = new BoundaryReconciler(deps.store, this.policies.mismatch, {
      namespace,
      mismatchThresholds: this.options.mismatchThresholds,
      defaultMismatchThreshold: this.options.defaultMismatchThreshold,
    });
    this.backfiller = new GapBackfiller(deps.store, this.writer, this.policies.gapFill, {
      namespace,
      backfillTimeframe: this.options.backfillTimeframe,
    });
  }

  /**
   * Staleness of every pair, in input order
   */
  async scan(pairs: SyncPair[]): Promise<ScanRow[]> {
    return this.inBatches(
      pairs,
      async (pair): Promise<ScanRow> => ({ pair, staleness: await this.staleness.check(pair) }),
      (pair, reason) => {
        const error = describeCause(reason);
        logger.error(
          { symbol: pair.symbol, timeframe: pair.timeframe, operation: 'read-latest', error },
          'Staleness check failed'
        );
        return { pair, staleness: null, error };
      }
    );
  }

  /**
   * Scan, then sync every pair that is not up to date and that the update
   * policy accepts
   */
  async run(pairs: SyncPair[], hooks: RunHooks = {}): Promise<SyncReport> {
    const startTime = Date.now();
    const scanned = await this.scan(pairs);
    hooks.onScan?.(scanned);

    const pending = scanned.filter((row) => row.staleness?.status !== 'up-to-date');
    logger.info(
      { event: 'sync_start', pairs: pairs.length, pending: pending.length },
      `${pending.length} of ${pairs.length} tables need an update`
    );

    const outcomes = await this.inBatches<ScanRow, PairOutcome>(
      pending,
      async (row): Promise<PairOutcome> => {
        if (!(await this.policies.update(row.pair, row.staleness))) {
          return { pair: row.pair, status: 'skipped', reason: 'declined' };
        }
        return this.syncPair(row.pair, storedLatestHint(row));
      },
      (row, reason) => ({ pair: row.pair, status: 'failed', operation: 'sync', error: describeCause(reason) })
    );

    const failed = outcomes.filter((o) => o.status === 'failed').length;
    logger.info(
      { event: 'sync_complete', processed: outcomes.length, failed, elapsedMs: Date.now() - startTime },
      `Sync complete: ${outcomes.length} processed, ${failed} failed`
    );

    return { scanned, outcomes };
  }

  /**
   * Sync one pair. Never throws; failures come back as a failed outcome.
   *
   * @param storedLatestHint - Newest stored timestamp when already known (null for an empty table)
   */
  async syncPair(pair: SyncPair, storedLatestHint?: number | null): Promise<PairOutcome> {
    const ref: CandleTableRef = { namespace: this.options.namespace, ...pair };
    const log = logger.child({ symbol: pair.symbol, timeframe: pair.timeframe });
    const step = { operation: 'fetch-history' };

    try {
      return await logger.perf.track(
        'sync_pair',
        () => this.runSteps(ref, pair, step, storedLatestHint),
        { symbol: pair.symbol, timeframe: pair.timeframe }
      );
    } catch (error) {
      const operation = error instanceof StoreWriteError ? error.operation : step.operation;
      const message = describeCause(error);
      log.error({ operation, error: message }, 'Sync failed');
      return { pair, status: 'failed', operation, error: message };
    }
  }

  private async runSteps(
    ref: CandleTableRef,
    pair: SyncPair,
    step: { operation: string },
    storedLatestHint: number | null | undefined
  ): Promise<PairOutcome> {
    const fetched = await this.history.fetch(pair);
    if (fetched.length === 0) {
      return { pair, status: 'skipped', reason: 'no-provider-data' };
    }

    step.operation = 'read-latest';
    const storedLatest =
      storedLatestHint === undefined ? await this.deps.store.getLatestTimestamp(ref) : storedLatestHint;

    let candles: Candle[] = fetched;
    let reconciliation: ReconciliationResult = { decision: 'not-checked' };
    let deadzone: Deadzone | null = null;
    let backfill: BackfillResult | null = null;

    if (storedLatest !== null) {
      step.operation = 'reconcile';
      ({ result: reconciliation, candles } = await this.reconciler.reconcile(pair, fetched, storedLatest));

      step.operation = 'gap-fill';
      deadzone = detectDeadzone(storedLatest, candles[0].timestamp);
      if (deadzone) {
        backfill = await this.backfiller.fill(pair, deadzone);
      }
    }

    step.operation = 'series-upsert';
    const written = await this.writer.write(ref, candles, 'series-upsert');
    const oldest = candles[0].timestamp;
    const newest = candles[candles.length - 1].timestamp;

    logger.info(
      { symbol: pair.symbol, timeframe: pair.timeframe, written, decision: reconciliation.decision },
      `Updated ${pair.symbol}_${pair.timeframe}: ${written} candles`
    );

    return { pair, status: 'updated', written, oldest, newest, reconciliation, deadzone, backfill };
  }

  /**
   * Run fn over items in batches of `concurrency`, keeping input order.
   * A rejected item is turned into a result by onRejected.
   */
  private async inBatches<T, R>(
    items: T[],
    fn: (item: T) => Promise<R>,
    onRejected: (item: T, reason: unknown) => R
  ): Promise<R[]> {
    const size = Math.max(1, this.options.concurrency);
    const results: R[] = [];

    for (let i = 0; i < items.length; i += size) {
      const batch = items.slice(i, i + size);
      const settled = await Promise.allSettled(batch.map((item) => fn(item)));
      settled.forEach((result, j) => {
        results.push(result.status === 'fulfilled' ? result.value : onRejected(batch[j], result.reason));
      });
    }

    return results;
  }
}

/**
 * Stored latest timestamp already read by the scan, when the scan read the store
 */
function storedLatestHint(row: ScanRow): number | null | undefined {
  const { staleness } = row;
  if (!staleness || (staleness.status === 'no-data' && staleness.reason === 'no-provider-data')) {
    return undefined;
  }
  return staleness.storedLatest;
}
