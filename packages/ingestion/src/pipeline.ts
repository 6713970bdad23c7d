import { validateRawMessage, type RawMessage, type ValidateRawMessagesOptions } from '@breachfeed/source-sdk';
import type { RecordStore, StoredRecord } from '@breachfeed/store';
import { resolveIngestionConfig } from './config.js';
import { createClassifier } from './classify.js';
import { createRecordParser } from './parse.js';
import { attachMessage, restoreRecord, serializeRecord } from './record.js';
import { mergeRecords } from './dedup.js';
import type { BatchIngestionResult, BatchStageStats, BreachRecord, IngestBatchOptions, IngestionLogger } from './types.js';

const DEFAULT_SOURCE_ID = 'channel';

const defaultLogger: IngestionLogger = {
  debug: (msg) => console.debug(msg),
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function emptyStats(): BatchStageStats {
  return {
    received: 0,
    validationDropped: 0,
    parsed: 0,
    structured: 0,
    parseDropped: 0,
    plainDropped: 0,
    relevanceDropped: 0,
    existing: 0,
    existingInvalid: 0,
    hashMismatches: 0,
    prunedExisting: 0,
    duplicates: 0,
    capped: 0,
    added: 0,
    stored: 0,
  };
}

async function loadExisting(store: RecordStore, logger: IngestionLogger, prefix: string): Promise<StoredRecord[]> {
  try {
    return await store.load();
  } catch (err) {
    logger.error(`${prefix} Failed to load existing records, continuing with empty store: ${errorMessage(err)}`);
    return [];
  }
}

/**
 * Ingest one batch of channel messages into the record store.
 * Stages: validate → parse → load → restore → merge → save
 *
 * Per-message problems only move counters. Transport and save failures end the
 * batch and are reported in `errors`; a failed load degrades to an empty store.
 */
export async function ingestBatch(
  messages: Iterable<RawMessage> | AsyncIterable<RawMessage>,
  store: RecordStore,
  options: IngestBatchOptions = {},
): Promise<BatchIngestionResult> {
  const { sourceId = DEFAULT_SOURCE_ID, logger = defaultLogger, limit, dryRun = false } = options;
  const start = performance.now();
  const prefix = `[ingest:${sourceId}]`;
  const stats = emptyStats();
  const errors: string[] = [];
  let saved = false;

  const finish = (): BatchIngestionResult => ({
    sourceId,
    stats,
    saved,
    errors,
    durationMs: performance.now() - start,
  });

  const config = resolveIngestionConfig(options.config);
  const classifier =
    options.classifier ??
    createClassifier({ breachIndicators: config.breachIndicators, spamIndicators: config.spamIndicators });
  const parser = createRecordParser({ config, classifier, logger });

  // 1-2. Validate + parse
  const incoming: BreachRecord[] = [];
  const onInvalid: ValidateRawMessagesOptions['onInvalid'] = (issues) => {
    const detail = issues.map((issue) => `${issue.path.join('.') || 'message'}: ${issue.message}`).join('; ');
    logger.debug(`${prefix} Invalid message: ${detail}`);
  };

  const accept = (message: RawMessage): void => {
    const validated = validateRawMessage(message, { onInvalid });
    if (!validated) {
      stats.validationDropped++;
      return;
    }

    const outcome = parser.inspect(validated.text);
    if (outcome.status === 'rejected') {
      if (outcome.reason === 'irrelevant') {
        stats.relevanceDropped++;
      } else if (outcome.reason === 'not_structured') {
        stats.plainDropped++;
      } else {
        stats.parseDropped++;
      }
      return;
    }

    incoming.push(attachMessage(outcome.record, { messageId: validated.id, timestamp: validated.timestamp }));
    stats.parsed++;
    if (outcome.format === 'structured') {
      stats.structured++;
    }
  };

  // Break right after the limit-th message: a lazy source must not be pulled again.
  if (limit === undefined || limit > 0) {
    try {
      for await (const message of messages) {
        stats.received++;
        accept(message);
        if (limit !== undefined && stats.received >= limit) {
          break;
        }
      }
    } catch (err) {
      const message = errorMessage(err);
      errors.push(message);
      logger.error(`${prefix} Message stream failed after ${stats.received} messages: ${message}`);
      return finish();
    }
  }

  if (stats.validationDropped > 0) {
    logger.warn(`${prefix} ${stats.validationDropped} messages failed validation`);
  }

  const plainNote = stats.plainDropped > 0 ? `, ${stats.plainDropped} plain-text skipped` : '';
  logger.info(
    `${prefix} Received ${stats.received} messages: ${stats.parsed} relevant (${stats.structured} JSON), ${stats.relevanceDropped} irrelevant, ${stats.parseDropped + stats.validationDropped} unusable${plainNote}`,
  );

  // 3-4. Load + restore
  const stored = await loadExisting(store, logger, prefix);
  const existing: BreachRecord[] = [];
  for (const item of stored) {
    const restored = restoreRecord(item, config);
    if (!restored) {
      stats.existingInvalid++;
      continue;
    }
    if (restored.hashMismatch) {
      stats.hashMismatches++;
    }
    existing.push(restored.record);
  }
  stats.existing = existing.length;

  if (stats.hashMismatches > 0) {
    logger.warn(
      `${prefix} ${stats.hashMismatches} stored records carry a hash_id from a different hash composition; re-keyed by content`,
    );
  }

  // 5. Merge
  const { records, stats: mergeStats } = mergeRecords(existing, incoming, {
    classifier,
    maxRecords: config.maxStoredRecords,
    incomingClassified: true,
  });
  stats.prunedExisting = mergeStats.prunedExisting;
  stats.duplicates = mergeStats.duplicateExisting + mergeStats.duplicateIncoming;
  stats.capped = mergeStats.capped;
  stats.added = mergeStats.added;
  stats.stored = records.length;

  if (stats.prunedExisting > 0) {
    logger.info(`${prefix} Pruned ${stats.prunedExisting} stored records that no longer pass the relevance filter`);
  }
  if (stats.capped > 0) {
    logger.warn(`${prefix} Truncated to ${config.maxStoredRecords} records, dropped ${stats.capped}`);
  }

  const changed =
    stats.added > 0 ||
    stats.prunedExisting > 0 ||
    mergeStats.cappedExisting > 0 ||
    stats.hashMismatches > 0 ||
    stats.existingInvalid > 0 ||
    mergeStats.duplicateExisting > 0;

  if (!changed) {
    logger.info(`${prefix} No changes, ${stats.stored} records unchanged`);
    return finish();
  }

  if (dryRun) {
    logger.info(`${prefix} Dry run: would store ${stats.stored} records (added ${stats.added} new)`);
    return finish();
  }

  // 6. Save
  try {
    await store.save(records.map(serializeRecord));
    saved = true;
    logger.info(`${prefix} Stored ${stats.stored} records (added ${stats.added} new)`);
  } catch (err) {
    const message = errorMessage(err);
    errors.push(message);
    logger.error(`${prefix} Error: ${message}`);
  }

  return finish();
}
