/**
 * Load the backtest and fronttest dump documents from the working directory
 * Run with: npm run import
 */
import { resolve } from 'node:path';
import { SYNC_CONFIG } from '@candle-sync/schemas';
import { PostgresCandleStore, createDatabase, testDatabaseConnection } from '@candle-sync/database';
import {
  BulkLoader,
  MissingInputError,
  StatusReporter,
  UpsertWriter,
  formatBulkLoadSummary,
} from '@candle-sync/sync-core';
import { closeAllLogs, flushAllLogs, logger, validateEnv } from '@candle-sync/utils';

async function main(): Promise<number> {
  const config = validateEnv();
  const database = createDatabase(config.DATABASE_URL);
  const reporter = new StatusReporter();

  try {
    await testDatabaseConnection(database.db);
    const loader = new BulkLoader(new UpsertWriter(new PostgresCandleStore(database.db)));

    for (const { file, namespace } of SYNC_CONFIG.bulkLoad.documents) {
      reporter.print([`[IMPORT] Loading ${file} into ${namespace} tables...`]);
      try {
        const summary = await loader.loadDocument(resolve(process.cwd(), file), namespace);
        reporter.print(formatBulkLoadSummary({ ...summary, file }));
      } catch (error) {
        if (error instanceof MissingInputError) {
          logger.error({ file: error.path }, `Could not find ${file}. Exiting.`);
          return 1;
        }
        throw error;
      }
    }

    return 0;
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
    logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Candle import aborted');
    await flushAllLogs();
    process.exit(1);
  });
