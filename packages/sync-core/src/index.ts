/**
 * @candle-sync/sync-core
 *
 * Keeps candle tables in step with the market-data provider and loads dumps
 */

export * from './errors';
export * from './policies';
export * from './normalizer';
export * from './staleness';
export * from './history';
export * from './reconciliation';
export * from './backfill';
export * from './writer';
export * from './sync';
export * from './report';
export * from './bulk-load';
