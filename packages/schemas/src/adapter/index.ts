/**
 * Contracts between the sync core and its collaborators:
 * - IMarketDataProvider: where fresh history comes from
 * - ICandleStore: where candles live
 */
export * from './market-data-provider.schema';
export * from './candle-store.schema';
