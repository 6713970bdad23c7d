import { ingestBatch, type BatchIngestionResult, type IngestionConfig } from '@breachfeed/ingestion';
import type { MessageSource } from '@breachfeed/source-sdk';
import type { RecordStore } from '@breachfeed/store';
import type { Logger } from 'pino';
import { createIngestionLogger } from '../observability/ingestion-logger.js';

export interface FetchChannelJobData {
  limit?: number;
  dryRun?: boolean;
  traceId?: string;
  config?: IngestionConfig;
}

export interface FetchChannelJobDeps {
  source: MessageSource;
  store: RecordStore;
  logger: Logger;
}

/**
 * Flat fields for the `run_completed` log entry.
 */
export function summarizeFetchChannelResult(result: BatchIngestionResult): Record<string, unknown> {
  return {
    sourceId: result.sourceId,
    saved: result.saved,
    ...result.stats,
  };
}

export async function handleFetchChannelJob(
  data: FetchChannelJobData,
  deps: FetchChannelJobDeps,
): Promise<BatchIngestionResult> {
  const { source } = deps;
  const fetched = await source.fetch({ limit: data.limit });
  const ingestionLogger = createIngestionLogger(
    deps.logger.child({
      sourceId: source.manifest.id,
      traceId: data.traceId,
    }),
  );

  const result = await ingestBatch(fetched.messages, deps.store, {
    sourceId: source.manifest.id,
    logger: ingestionLogger,
    limit: data.limit,
    dryRun: data.dryRun,
    config: data.config,
  });

  if (result.errors.length > 0) {
    throw new Error(`[fetch-channel:${source.manifest.id}] ${result.errors.join(' | ')}`);
  }

  return result;
}
