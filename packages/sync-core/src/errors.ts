import type { CandleTableRef, SyncPair } from '@candle-sync/schemas';

/**
 * A required input document is absent
 */
export class MissingInputError extends Error {
  constructor(readonly path: string) {
    super(`Input document not found: ${path}`);
    this.name = 'MissingInputError';
  }
}

/**
 * The market-data provider failed to answer for a pair
 */
export class ProviderUnavailableError extends Error {
  constructor(
    readonly pair: SyncPair,
    readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Provider unavailable for ${pair.symbol} ${pair.timeframe} (${operation}): ${describeCause(options?.cause)}`,
      options
    );
    this.name = 'ProviderUnavailableError';
  }
}

/**
 * A raw candle could not be turned into a canonical one
 */
export class CandleNormalizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CandleNormalizationError';
  }
}

/**
 * A write against the candle store failed. Carries the table and the step
 * that was writing so the failure can be reported per pair.
 */
export class StoreWriteError extends Error {
  constructor(
    readonly ref: CandleTableRef,
    readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Write to ${ref.namespace}.${ref.symbol}_${ref.timeframe} failed during ${operation}: ${describeCause(options?.cause)}`,
      options
    );
    this.name = 'StoreWriteError';
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
