import { describe, expect, it } from 'vitest';
import { InMemoryCandleStore } from '../__tests__/fakes';
import { MissingInputError } from '../errors';
import { UpsertWriter } from '../writer';
import { BulkLoader, formatBulkLoadSummary, type ReadDocument } from './bulk-loader';

const row = (symbol: string, timestamp: string, open: number, close: number) => ({
  symbol,
  timestamp,
  open,
  high: Math.max(open, close),
  low: Math.min(open, close),
  close,
  volume: 5,
  candle_color: 'green',
});

function loaderFor(documents: Record<string, unknown>) {
  const store = new InMemoryCandleStore();
  const read: ReadDocument = async (path) => {
    if (!(path in documents)) {
      throw Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: 'ENOENT' });
    }
    const doc = documents[path];
    return typeof doc === 'string' ? doc : JSON.stringify(doc);
  };
  return { store, loader: new BulkLoader(new UpsertWriter(store), read) };
}

describe('BulkLoader', () => {
  it('loads each table and recomputes colors', async () => {
    const { store, loader } = loaderFor({
      'backtest_data.json': {
        tables: [
          {
            table: 'es_1m',
            rows: [row('es', '2025-03-26T08:01:00+00:00', 5000, 4999), row('es', '2025-03-26T08:00:00', 5000, 5001)],
          },
        ],
      },
    });

    const summary = await loader.loadDocument('backtest_data.json', 'backtest');

    expect(summary).toEqual({
      file: 'backtest_data.json',
      namespace: 'backtest',
      tables: [{ table: 'backtest.es_1m', status: 'loaded', rows: 2 }],
      rowsWritten: 2,
    });
    const rows = store.rows({ namespace: 'backtest', symbol: 'es', timeframe: '1m' });
    expect(rows.map((c) => [c.timestamp, c.candleColor])).toEqual([
      [Date.UTC(2025, 2, 26, 8, 0), 'green'],
      [Date.UTC(2025, 2, 26, 8, 1), 'red'],
    ]);
  });

  it('does not realign dump timestamps', async () => {
    const { store, loader } = loaderFor({
      'fronttest_data.json': { tables: [{ table: 'spy_1d', rows: [row('spy', '2025-03-26T14:30:00Z', 570, 571)] }] },
    });

    await loader.loadDocument('fronttest_data.json', 'fronttest');

    expect(store.rows({ namespace: 'fronttest', symbol: 'spy', timeframe: '1d' })[0].timestamp).toBe(
      Date.UTC(2025, 2, 26, 14, 30)
    );
  });

  it('skips unknown and empty tables and fails mismatched ones', async () => {
    const { store, loader } = loaderFor({
      'backtest_data.json': {
        tables: [
          { table: 'btc_1m', rows: [row('btc', '2025-03-26T08:00:00Z', 1, 2)] },
          { table: 'es_5m', rows: [] },
          { table: 'es_15m', rows: null },
          { table: 'spy_4h', rows: [row('spy', '2025-03-26T08:00:00Z', 1, 2), row('es', '2025-03-26T12:00:00Z', 1, 2)] },
          { table: 'eurusd_1h', rows: [row('eurusd', '2025-03-26T08:00:00Z', 1.08, 1.08)] },
        ],
      },
    });

    const summary = await loader.loadDocument('backtest_data.json', 'backtest');

    expect(summary.tables).toEqual([
      { table: 'backtest.btc_1m', status: 'skipped', reason: 'unknown-table' },
      { table: 'backtest.es_5m', status: 'skipped', reason: 'no-rows' },
      { table: 'backtest.es_15m', status: 'skipped', reason: 'no-rows' },
      { table: 'backtest.spy_4h', status: 'failed', error: "row 1 has symbol 'es', expected 'spy'" },
      { table: 'backtest.eurusd_1h', status: 'loaded', rows: 1 },
    ]);
    expect(summary.rowsWritten).toBe(1);
    expect(store.writes).toEqual([{ table: 'backtest.eurusd_1h', timestamps: [Date.UTC(2025, 2, 26, 8, 0)] }]);
  });

  it('reports a store failure on its table only', async () => {
    const { store, loader } = loaderFor({
      'fronttest_data.json': {
        tables: [
          { table: 'es_1m', rows: [row('es', '2025-03-26T08:00:00Z', 1, 2)] },
          { table: 'es_5m', rows: [row('es', '2025-03-26T08:00:00Z', 1, 2)] },
        ],
      },
    });
    store.failWritesFor.add('fronttest.es_1m');

    const summary = await loader.loadDocument('fronttest_data.json', 'fronttest');

    expect(summary.tables.map((t) => t.status)).toEqual(['failed', 'loaded']);
  });

  it('raises MissingInputError for an absent document', async () => {
    const { loader } = loaderFor({});
    await expect(loader.loadDocument('backtest_data.json', 'backtest')).rejects.toBeInstanceOf(MissingInputError);
  });

  it('rejects documents that are not candle dumps', async () => {
    const { loader } = loaderFor({ 'a.json': '{not json', 'b.json': { tables: [{ rows: [] }] } });
    await expect(loader.loadDocument('a.json', 'backtest')).rejects.toThrow('a.json is not valid JSON');
    await expect(loader.loadDocument('b.json', 'backtest')).rejects.toThrow('b.json is not a candle dump: tables.0.table');
  });
});

describe('formatBulkLoadSummary', () => {
  it('prints one line per table and a total', () => {
    expect(
      formatBulkLoadSummary({
        file: 'backtest_data.json',
        namespace: 'backtest',
        rowsWritten: 12,
        tables: [
          { table: 'backtest.es_1m', status: 'loaded', rows: 12 },
          { table: 'backtest.es_5m', status: 'skipped', reason: 'no-rows' },
          { table: 'backtest.es_9m', status: 'skipped', reason: 'unknown-table' },
          { table: 'backtest.es_1h', status: 'failed', error: 'boom' },
        ],
      })
    ).toEqual([
      '  [IMPORT] backtest.es_1m: 12 rows',
      '  [INFO] backtest.es_5m has no rows. Skipping.',
      '  [WARN] backtest.es_9m is not a known table. Skipping.',
      '  [ERROR] backtest.es_1h: boom',
      '[INFO] Finished loading backtest_data.json: 12 rows written.',
    ]);
  });
});
