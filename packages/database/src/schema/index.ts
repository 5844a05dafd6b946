export * from './candle-tables';
