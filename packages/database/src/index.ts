/**
 * @candle-sync/database
 *
 * Candle table registry, connection handle and the PostgreSQL candle store
 */

export * from './client';
export * from './schema';
export * from './store';
