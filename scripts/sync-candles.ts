/**
 * Sync the fronttest candle tables with Yahoo Finance
 * Run with: npm run sync
 *
 * Prints the staleness table, updates every table that is behind, then
 * prints one status line per updated table.
 */
import { PostgresCandleStore, createDatabase, testDatabaseConnection } from '@candle-sync/database';
import { StatusReporter, SyncService, configuredPairs, policiesFromEnv } from '@candle-sync/sync-core';
import { closeAllLogs, flushAllLogs, logger, validateEnv } from '@candle-sync/utils';
import { YahooRestClient } from '@candle-sync/yahoo-client';

async function main(): Promise<number> {
  const config = validateEnv();
  const database = createDatabase(config.DATABASE_URL);

  try {
    await testDatabaseConnection(database.db);

    const service = new SyncService({
      provider: new YahooRestClient({ baseUrl: config.YAHOO_BASE_URL, timeoutMs: config.YAHOO_TIMEOUT_MS }),
      store: new PostgresCandleStore(database.db),
      policies: policiesFromEnv(config),
      options: { concurrency: config.SYNC_CONCURRENCY },
    });
    const reporter = new StatusReporter();

    const report = await service.run(configuredPairs(), {
      onScan: (rows) => reporter.printScan(rows),
    });
    reporter.printOutcomes(report.outcomes);

    return report.outcomes.some((outcome) => outcome.status === 'failed') ? 1 : 0;
  } finally {
    await database.close();
  }
}

main()
  .then(async (code) => {
    await flushAllLogs();
    closeAllLogs();
    process.exit(code);
  })
  .catch(async (error: unknown) => {
    logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Candle sync aborted');
    await flushAllLogs();
    process.exit(1);
  });
