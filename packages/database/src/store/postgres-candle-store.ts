import { and, asc, desc, eq, gte, lte, sql } from 'drizzle-orm';
import {
  SYNC_CONFIG,
  type Candle,
  type CandleTableRef,
  type ICandleStore,
  type MarketSymbol,
  type RawCandle,
} from '@candle-sync/schemas';
import { computeCandleColor, createLogger } from '@candle-sync/utils';
import type { Database } from '../client';
import { resolveCandleTable, resolveSecondaryTable, type CandleTable, type SecondaryCandleTable } from '../schema';

const logger = createLogger('database');

type CandleRow = CandleTable['$inferInsert'];

/** The database itself or an open transaction on it */
type Executor = Pick<Database, 'insert'>;
type Reader = Pick<Database, 'select'>;

function toRow(candle: Candle): CandleRow {
  return {
    symbol: candle.symbol,
    timestamp: new Date(candle.timestamp),
    open: candle.open,
    high: candle.high,
    low: candle.low,
    close: candle.close,
    volume: candle.volume,
    candleColor: candle.candleColor,
  };
}

/**
 * INSERT ... ON CONFLICT (symbol, timestamp) DO UPDATE overwriting every
 * non-key column with the incoming values
 */
export function buildUpsert(db: Executor, table: CandleTable, rows: CandleRow[]) {
  return db
    .insert(table)
    .values(rows)
    .onConflictDoUpdate({
      target: [table.symbol, table.timestamp],
      set: {
        open: sql`excluded.open`,
        high: sql`excluded.high`,
        low: sql`excluded.low`,
        close: sql`excluded.close`,
        volume: sql`excluded.volume`,
        candleColor: sql`excluded.candle_color`,
      },
    });
}

/**
 * Newest row timestamp for a symbol
 */
export function buildLatestTimestampQuery(db: Reader, table: CandleTable, symbol: MarketSymbol) {
  return db
    .select({ timestamp: table.timestamp })
    .from(table)
    .where(eq(table.symbol, symbol))
    .orderBy(desc(table.timestamp))
    .limit(1);
}

/**
 * The row at exactly one timestamp
 */
export function buildCandleAtQuery(db: Reader, table: CandleTable, symbol: MarketSymbol, timestamp: number) {
  return db
    .select()
    .from(table)
    .where(and(eq(table.symbol, symbol), eq(table.timestamp, new Date(timestamp))))
    .limit(1);
}

/**
 * Secondary rows in [start, end], both ends inclusive, oldest first
 */
export function buildSecondaryRangeQuery(db: Reader, table: SecondaryCandleTable, start: number, end: number) {
  return db
    .select({
      timestamp: table.timestamp,
      open: table.open,
      high: table.high,
      low: table.low,
      close: table.close,
      volume: table.volume,
    })
    .from(table)
    .where(and(gte(table.timestamp, new Date(start)), lte(table.timestamp, new Date(end))))
    .orderBy(asc(table.timestamp));
}

/**
 * ICandleStore over PostgreSQL.
 *
 * Callers pass candles with unique timestamps per call; Postgres rejects an
 * upsert statement that touches the same key twice.
 */
export class PostgresCandleStore implements ICandleStore {
  constructor(
    private readonly db: Database,
    private readonly chunkSize: number = SYNC_CONFIG.database.upsertChunkSize
  ) {}

  async getLatestTimestamp(ref: CandleTableRef): Promise<number | null> {
    const [row] = await buildLatestTimestampQuery(this.db, resolveCandleTable(ref), ref.symbol);

    return row ? row.timestamp.getTime() : null;
  }

  async getCandleAt(ref: CandleTableRef, timestamp: number): Promise<Candle | null> {
    const [row] = await buildCandleAtQuery(this.db, resolveCandleTable(ref), ref.symbol, timestamp);

    if (!row) {
      return null;
    }

    return {
      symbol: ref.symbol,
      timeframe: ref.timeframe,
      timestamp: row.timestamp.getTime(),
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume,
      candleColor: computeCandleColor(row.open, row.close),
    };
  }

  async upsertCandles(ref: CandleTableRef, candles: Candle[]): Promise<number> {
    if (candles.length === 0) {
      return 0;
    }

    const table = resolveCandleTable(ref);
    const rows = candles.map(toRow);

    await this.db.transaction(async (tx) => {
      for (let i = 0; i < rows.length; i += this.chunkSize) {
        await buildUpsert(tx, table, rows.slice(i, i + this.chunkSize));
      }
    });

    logger.debug(
      { ...ref, rows: rows.length, operation: 'upsert' },
      `Upserted ${rows.length} rows into ${ref.namespace}.${ref.symbol}_${ref.timeframe}`
    );
    return rows.length;
  }

  async getSecondaryRange(symbol: MarketSymbol, start: number, end: number): Promise<RawCandle[]> {
    return await buildSecondaryRangeQuery(this.db, resolveSecondaryTable(symbol), start, end);
  }
}
