import { z } from 'zod';
import type { MarketSymbol, Timeframe } from '../market/candle.schema';

/**
 * Environment configuration schema
 * Validates all environment variables on process startup
 */
export const EnvConfigSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // PostgreSQL data source location
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),

  // Conflict policy for a boundary candle that disagrees with the provider
  SYNC_MISMATCH_POLICY: z.enum(['keep-provider', 'keep-stored']).default('keep-provider'),

  // Whether 1m deadzones are filled from the secondary store
  SYNC_GAP_FILL: z
    .enum(['true', 'false'])
    .default('true')
    .transform((val) => val === 'true'),

  // Number of (symbol, timeframe) pairs processed at once
  SYNC_CONCURRENCY: z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().positive()).default('1'),

  // Yahoo Finance chart API
  YAHOO_BASE_URL: z.string().url().default('https://query1.finance.yahoo.com'),
  YAHOO_TIMEOUT_MS: z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().positive()).default('30000'),
});

/**
 * Validated environment configuration type
 */
export type EnvConfig = z.infer<typeof EnvConfigSchema>;

/**
 * Names of the Postgres schemas holding candle tables
 */
export const CandleNamespaceSchema = z.enum(['fronttest', 'backtest']);
export type CandleNamespace = z.infer<typeof CandleNamespaceSchema>;

/**
 * Per-symbol timestamp alignment for daily bars: hour/minute (UTC) the bar is
 * anchored to on its calendar date.
 */
export interface DailyAnchor {
  hour: number;
  minute: number;
}

/**
 * Fixed shift applied to one symbol's timeframe
 */
export interface TimestampShift {
  symbol: MarketSymbol;
  timeframe: Timeframe;
  offsetMs: number;
}

export interface AlignmentRules {
  /** Anchor used for daily bars of symbols not listed in dailyAnchors */
  defaultDailyAnchor: DailyAnchor;
  dailyAnchors: Partial<Record<MarketSymbol, DailyAnchor>>;
  shifts: TimestampShift[];
}

export interface SyncConfig {
  /** Schema synced against the provider */
  targetNamespace: CandleNamespace;
  /** Schema holding raw 1m data used to fill deadzones (Postgres default schema) */
  secondaryNamespace: 'public';
  symbols: readonly MarketSymbol[];
  /** Timeframes synced against the provider */
  syncTimeframes: readonly Timeframe[];
  /** Only this timeframe is backfilled from the secondary store */
  backfillTimeframe: Timeframe;
  /** Provider vs store latest timestamp difference still considered current */
  stalenessToleranceMs: number;
  /** Absolute open/close difference tolerated on the boundary candle */
  mismatchThresholds: Partial<Record<MarketSymbol, number>>;
  defaultMismatchThreshold: number;
  alignment: AlignmentRules;
  database: {
    poolSize: number;
    connectTimeoutSec: number;
    idleTimeoutSec: number;
    /** Rows per INSERT statement inside one upsert transaction */
    upsertChunkSize: number;
  };
  /** Bulk loader input documents, read from the working directory in order */
  bulkLoad: {
    documents: ReadonlyArray<{ file: string; namespace: CandleNamespace }>;
  };
}

/**
 * Hardcoded configuration values (not from environment variables)
 */
export const SYNC_CONFIG: SyncConfig = {
  targetNamespace: 'fronttest',
  secondaryNamespace: 'public',
  symbols: ['es', 'eurusd', 'spy'],
  // 4h has tables but the provider is not asked for it
  syncTimeframes: ['1m', '5m', '15m', '30m', '1h', '1d'],
  backfillTimeframe: '1m',
  stalenessToleranceMs: 90_000,
  mismatchThresholds: {
    es: 0.25,
    eurusd: 0.0005,
    spy: 0.1,
  },
  defaultMismatchThreshold: 0.01,
  alignment: {
    defaultDailyAnchor: { hour: 0, minute: 0 },
    dailyAnchors: {
      spy: { hour: 14, minute: 30 },
    },
    // Provider 5m eurusd bars run 5h behind the source clock
    shifts: [{ symbol: 'eurusd', timeframe: '5m', offsetMs: 5 * 60 * 60 * 1000 }],
  },
  database: {
    poolSize: 10,
    connectTimeoutSec: 10,
    idleTimeoutSec: 20,
    upsertChunkSize: 1000,
  },
  bulkLoad: {
    documents: [
      { file: 'backtest_data.json', namespace: 'backtest' },
      { file: 'fronttest_data.json', namespace: 'fronttest' },
    ],
  },
};
