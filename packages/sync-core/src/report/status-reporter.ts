import { formatTimestamp } from '@candle-sync/utils';
import type { PairOutcome, ScanRow } from '../sync/types';
import type { SyncPair } from '@candle-sync/schemas';

/**
 * Renders rows of cells into output lines
 */
export interface TableFormatter {
  format(headers: readonly string[], rows: readonly string[][]): string[];
}

export type LineSink = (line: string) => void;

export const stdoutSink: LineSink = (line) => {
  process.stdout.write(`${line}\n`);
};

/**
 * Left-aligned columns separated by two spaces, with a dashed rule under the header
 */
export const plainTableFormatter: TableFormatter = {
  format(headers, rows) {
    const widths = headers.map((header, i) => Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length)));
    const line = (cells: readonly string[]) =>
      widths
        .map((width, i) => (cells[i] ?? '').padEnd(width))
        .join('  ')
        .trimEnd();
    return [line(headers), widths.map((width) => '-'.repeat(width)).join('  '), ...rows.map(line)];
  },
};

export const STATUS_HEADERS = ['Table', 'Latest DB Candle', 'Status'] as const;

function tableName(pair: SyncPair): string {
  return `${pair.symbol}_${pair.timeframe}`;
}

function latestCell(row: ScanRow): string {
  const { staleness } = row;
  if (!staleness) {
    return 'ERROR';
  }
  if (staleness.status === 'no-data') {
    return staleness.reason === 'no-provider-data' ? 'NO PROVIDER DATA' : 'NO STORED DATA';
  }
  return formatTimestamp(staleness.storedLatest);
}

export function formatStatusTable(rows: readonly ScanRow[], formatter: TableFormatter = plainTableFormatter): string[] {
  return formatter.format(
    STATUS_HEADERS,
    rows.map((row) => [tableName(row.pair), latestCell(row), row.staleness?.status === 'up-to-date' ? '✅' : '❌'])
  );
}

/**
 * Final status line for one pair
 */
export function formatOutcomeLine(outcome: PairOutcome): string {
  const table = tableName(outcome.pair);

  switch (outcome.status) {
    case 'failed':
      return `❌ ${table} failed during ${outcome.operation}: ${outcome.error}`;
    case 'skipped':
      return `⚠️ ${table} skipped: ${outcome.reason === 'declined' ? 'update declined' : 'no provider data'}`;
    case 'updated': {
      const details = [`${formatTimestamp(outcome.oldest)} to ${formatTimestamp(outcome.newest)}`];
      if (outcome.backfill?.status === 'filled') {
        details.push(`deadzone filled with ${outcome.backfill.written}`);
      }
      if (outcome.reconciliation.decision === 'mismatch-keep-stored') {
        details.push('boundary kept stored values');
      } else if (outcome.reconciliation.decision === 'mismatch-keep-provider') {
        details.push('boundary overwritten from provider');
      }
      return `✅ ${table} updated: ${outcome.written} candles (${details.join('; ')})`;
    }
  }
}

/**
 * Writes scan tables and outcome lines to a sink
 */
export class StatusReporter {
  constructor(
    private readonly sink: LineSink = stdoutSink,
    private readonly formatter: TableFormatter = plainTableFormatter
  ) {}

  print(lines: readonly string[]): void {
    for (const line of lines) {
      this.sink(line);
    }
  }

  printScan(rows: readonly ScanRow[]): void {
    this.print(formatStatusTable(rows, this.formatter));
    if (rows.every((row) => row.staleness?.status === 'up-to-date')) {
      this.sink('All tables are up to date.');
    }
  }

  printOutcomes(outcomes: readonly PairOutcome[]): void {
    this.print(outcomes.map(formatOutcomeLine));
  }
}
