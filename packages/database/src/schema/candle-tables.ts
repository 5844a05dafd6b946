import {
  pgSchema,
  pgTable,
  varchar,
  timestamp,
  doublePrecision,
  bigint,
  unique,
} from 'drizzle-orm/pg-core';
import {
  CandleNamespaceSchema,
  MarketSymbolSchema,
  TimeframeSchema,
  type CandleNamespace,
  type CandleTableRef,
  type MarketSymbol,
  type Timeframe,
} from '@candle-sync/schemas';

/**
 * Raised when a table ref or identifier is not part of the known table set
 */
export class UnknownTableError extends Error {
  constructor(identifier: string) {
    super(`Unknown candle table: ${identifier}`);
    this.name = 'UnknownTableError';
  }
}

/**
 * Short table identifier, e.g. 'es_1m'
 */
export function candleTableName(symbol: MarketSymbol, timeframe: Timeframe): string {
  return `${symbol}_${timeframe}`;
}

/**
 * Candle table: <namespace>.<symbol>_<timeframe>, one row per (symbol, timestamp)
 */
function defineCandleTable(namespace: CandleNamespace, symbol: MarketSymbol, timeframe: Timeframe) {
  const name = candleTableName(symbol, timeframe);
  return pgSchema(namespace).table(
    name,
    {
      symbol: varchar('symbol', { length: 10 }).notNull(),
      timestamp: timestamp('timestamp', { withTimezone: true, mode: 'date' }).notNull(),
      open: doublePrecision('open').notNull(),
      high: doublePrecision('high').notNull(),
      low: doublePrecision('low').notNull(),
      close: doublePrecision('close').notNull(),
      volume: bigint('volume', { mode: 'number' }).notNull(),
      candleColor: varchar('candle_color', { length: 5 }).notNull(),
    },
    (table) => ({
      symbolTimestamp: unique(`${name}_symbol_timestamp_key`).on(table.symbol, table.timestamp),
    })
  );
}

/**
 * Raw 1m table in the default schema used to fill deadzones.
 * Only the columns read by the backfill are declared.
 */
function defineSecondaryTable(symbol: MarketSymbol) {
  return pgTable(candleTableName(symbol, '1m'), {
    symbol: varchar('symbol', { length: 10 }).notNull(),
    timestamp: timestamp('timestamp', { withTimezone: true, mode: 'date' }).notNull(),
    open: doublePrecision('open').notNull(),
    high: doublePrecision('high').notNull(),
    low: doublePrecision('low').notNull(),
    close: doublePrecision('close').notNull(),
    volume: bigint('volume', { mode: 'number' }),
  });
}

export type CandleTable = ReturnType<typeof defineCandleTable>;
export type SecondaryCandleTable = ReturnType<typeof defineSecondaryTable>;

function refKey(namespace: CandleNamespace, name: string): string {
  return `${namespace}.${name}`;
}

// Closed registry: every table the process may touch is created here, once
const candleTables = new Map<string, CandleTable>();
for (const namespace of CandleNamespaceSchema.options) {
  for (const symbol of MarketSymbolSchema.options) {
    for (const timeframe of TimeframeSchema.options) {
      candleTables.set(
        refKey(namespace, candleTableName(symbol, timeframe)),
        defineCandleTable(namespace, symbol, timeframe)
      );
    }
  }
}

const secondaryTables = new Map<MarketSymbol, SecondaryCandleTable>(
  MarketSymbolSchema.options.map((symbol) => [symbol, defineSecondaryTable(symbol)])
);

/**
 * Number of tables in the registry
 */
export function candleTableCount(): number {
  return candleTables.size;
}

/**
 * Table for a ref. Refs are validated at runtime so a value that slipped past
 * the type system cannot name an arbitrary table.
 */
export function resolveCandleTable(ref: CandleTableRef): CandleTable {
  const key = refKey(ref.namespace, `${ref.symbol}_${ref.timeframe}`);
  const table = candleTables.get(key);
  if (!table) {
    throw new UnknownTableError(key);
  }
  return table;
}

export function resolveSecondaryTable(symbol: MarketSymbol): SecondaryCandleTable {
  const table = secondaryTables.get(symbol);
  if (!table) {
    throw new UnknownTableError(`public.${symbol}_1m`);
  }
  return table;
}
