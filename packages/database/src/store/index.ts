export {
  PostgresCandleStore,
  buildUpsert,
  buildLatestTimestampQuery,
  buildCandleAtQuery,
  buildSecondaryRangeQuery,
} from './postgres-candle-store';
