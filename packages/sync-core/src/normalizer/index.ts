export * from './candle-normalizer';
