import { createTelegramExportSource } from '@breachfeed/source-telegram-export';
import { JsonFileStore } from '@breachfeed/store';
import { loadFetcherConfig } from './config.js';
import { handleFetchChannelJob, summarizeFetchChannelResult } from './jobs/fetch-channel.js';
import { createStoreLogger } from './observability/ingestion-logger.js';
import { createFetcherLogger } from './observability/logger.js';
import { serializeError, withRunLogger } from './observability/with-logger.js';

const logger = createFetcherLogger();

async function run(): Promise<void> {
  const config = loadFetcherConfig();
  const source = createTelegramExportSource({ path: config.exportPath, channel: config.channel });
  const store = new JsonFileStore({
    path: config.dataFile,
    backupPath: config.backupFile,
    backupEnabled: config.backupEnabled,
    logger: createStoreLogger(logger),
  });

  await withRunLogger({
    logger,
    name: 'fetch-channel',
    traceId: process.env.TRACE_ID,
    context: () => ({
      sourceId: source.manifest.id,
      dataFile: config.dataFile,
      dryRun: config.dryRun,
    }),
    run: (traceId) =>
      handleFetchChannelJob(
        {
          limit: config.messageLimit,
          dryRun: config.dryRun,
          traceId,
          config: { maxStoredRecords: config.maxStoredRecords, structuredOnly: config.structuredOnly },
        },
        { source, store, logger },
      ),
    summary: summarizeFetchChannelResult,
  });
}

run()
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    logger.fatal({ event: 'fetcher_failed', error: serializeError(error) }, 'Fetcher failed');
    process.exit(1);
  });
