/**
 * @candle-sync/utils
 *
 * Shared utility functions and helpers
 */

// Logger
export * from './logger/logger';
export * from './logger/log-config';
export * from './logger/file-transport';
export * from './logger/performance';

// Time utilities
export * from './time/timeframe';

// Validation utilities
export * from './validation/env-validator';

// Candle utilities
export * from './candle/candle-utils';
