import { describe, it, expect } from 'vitest';
import { getTableConfig } from 'drizzle-orm/pg-core';
import type { CandleTableRef } from '@candle-sync/schemas';
import {
  UnknownTableError,
  candleTableCount,
  resolveCandleTable,
  resolveSecondaryTable,
} from './candle-tables';

describe('candle table registry', () => {
  it('holds one table per namespace, symbol and timeframe', () => {
    // 2 namespaces x 3 symbols x 7 timeframes
    expect(candleTableCount()).toBe(42);
  });

  it('resolves a ref to its schema-qualified table', () => {
    const config = getTableConfig(
      resolveCandleTable({ namespace: 'fronttest', symbol: 'eurusd', timeframe: '5m' })
    );
    expect(config.schema).toBe('fronttest');
    expect(config.name).toBe('eurusd_5m');
  });

  it('returns the same table object for the same ref', () => {
    const ref: CandleTableRef = { namespace: 'backtest', symbol: 'es', timeframe: '1d' };
    expect(resolveCandleTable(ref)).toBe(resolveCandleTable({ ...ref }));
  });

  it('rejects refs that escaped the type system', () => {
    const ref: CandleTableRef = { namespace: 'fronttest', symbol: 'es', timeframe: '1m' };
    Reflect.set(ref, 'namespace', 'public');
    expect(() => resolveCandleTable(ref)).toThrow(UnknownTableError);
    expect(() => resolveCandleTable(ref)).toThrow('Unknown candle table: public.es_1m');
  });

  it('maps secondary tables to the default schema', () => {
    const config = getTableConfig(resolveSecondaryTable('es'));
    expect(config.schema).toBeUndefined();
    expect(config.name).toBe('es_1m');
  });
});
