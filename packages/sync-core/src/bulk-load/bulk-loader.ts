import { readFile } from 'node:fs/promises';
import {
  BulkDocumentSchema,
  parseTableIdentifier,
  type BulkDocument,
  type BulkTable,
  type Candle,
  type CandleNamespace,
  type CandleTableRef,
} from '@candle-sync/schemas';
import { createLogger } from '@candle-sync/utils';
import { MissingInputError, describeCause } from '../errors';
import { normalizeCandle } from '../normalizer';
import type { UpsertWriter } from '../writer';

const logger = createLogger('bulk-load');

export type TableLoadResult =
  | { table: string; status: 'loaded'; rows: number }
  | { table: string; status: 'skipped'; reason: 'unknown-table' | 'no-rows' }
  | { table: string; status: 'failed'; error: string };

export interface BulkLoadSummary {
  file: string;
  namespace: CandleNamespace;
  tables: TableLoadResult[];
  rowsWritten: number;
}

export type ReadDocument = (path: string) => Promise<string>;

const readUtf8: ReadDocument = (path) => readFile(path, 'utf-8');

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Imports dump documents into the candle tables of one namespace, one
 * transaction per table. A bad table is reported and the rest still load.
 */
export class BulkLoader {
  constructor(
    private readonly writer: UpsertWriter,
    private readonly readDocument: ReadDocument = readUtf8
  ) {}

  async loadDocument(path: string, namespace: CandleNamespace): Promise<BulkLoadSummary> {
    const document = await this.parse(path);
    const tables: TableLoadResult[] = [];

    for (const entry of document.tables) {
      tables.push(await this.loadTable(namespace, entry));
    }

    const rowsWritten = tables.reduce((sum, t) => sum + (t.status === 'loaded' ? t.rows : 0), 0);
    logger.info({ file: path, namespace, tables: tables.length, rowsWritten }, `Finished loading ${path}`);
    return { file: path, namespace, tables, rowsWritten };
  }

  private async parse(path: string): Promise<BulkDocument> {
    let text: string;
    try {
      text = await this.readDocument(path);
    } catch (error) {
      if (isNotFound(error)) {
        throw new MissingInputError(path);
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (cause) {
      throw new Error(`${path} is not valid JSON: ${describeCause(cause)}`, { cause });
    }

    const result = BulkDocumentSchema.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new Error(`${path} is not a candle dump: ${issue.path.join('.')} ${issue.message}`);
    }
    return result.data;
  }

  private async loadTable(namespace: CandleNamespace, entry: BulkTable): Promise<TableLoadResult> {
    const table = `${namespace}.${entry.table}`;
    const ref = parseTableIdentifier(namespace, entry.table);
    if (!ref) {
      logger.warn({ table }, 'Unknown table in dump, skipping');
      return { table, status: 'skipped', reason: 'unknown-table' };
    }

    if (entry.rows.length === 0) {
      logger.info({ table }, 'No rows in dump, skipping');
      return { table, status: 'skipped', reason: 'no-rows' };
    }

    try {
      const candles = this.toCandles(ref, entry);
      const rows = await this.writer.write(ref, candles, 'bulk-load');
      logger.info({ table, rows }, `Inserted ${rows} rows into ${table}`);
      return { table, status: 'loaded', rows };
    } catch (cause) {
      const error = describeCause(cause);
      logger.error(
        { table, symbol: ref.symbol, timeframe: ref.timeframe, operation: 'bulk-load', error },
        'Table load failed'
      );
      return { table, status: 'failed', error };
    }
  }

  private toCandles(ref: CandleTableRef, entry: BulkTable): Candle[] {
    return entry.rows.map((row, index) => {
      if (row.symbol !== ref.symbol) {
        throw new Error(`row ${index} has symbol '${row.symbol}', expected '${ref.symbol}'`);
      }
      // Dumps are already on the store's grid
      return normalizeCandle(row, ref.symbol, ref.timeframe, null);
    });
  }
}

/**
 * Console lines for a finished document
 */
export function formatBulkLoadSummary(summary: BulkLoadSummary): string[] {
  const lines = summary.tables.map((result): string => {
    switch (result.status) {
      case 'loaded':
        return `  [IMPORT] ${result.table}: ${result.rows} rows`;
      case 'skipped':
        return result.reason === 'no-rows'
          ? `  [INFO] ${result.table} has no rows. Skipping.`
          : `  [WARN] ${result.table} is not a known table. Skipping.`;
      case 'failed':
        return `  [ERROR] ${result.table}: ${result.error}`;
    }
  });
  return [...lines, `[INFO] Finished loading ${summary.file}: ${summary.rowsWritten} rows written.`];
}
