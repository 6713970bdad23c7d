import type { PersistedRecord, StoredRecord } from '@breachfeed/store';
import { CATCH_ALL_BREACH_TYPE, UNKNOWN_SOURCE, isBreachType, type ResolvedIngestionConfig } from './config.js';
import { computeContentHash } from './fingerprint.js';
import { stripUnsafeChars, truncate } from './normalize.js';
import type { BreachRecord, ParsedRecord, RecordCandidate } from './types.js';

export interface MessageMeta {
  messageId: number;
  timestamp: Date;
}

type RecordLimits = Pick<
  ResolvedIngestionConfig,
  'maxContentLength' | 'maxSourceLength' | 'maxAuthorLength' | 'allowedBreachTypes' | 'defaultBreachType'
>;

/**
 * Apply caps, enum coercion and author sanitizing, then derive the hash.
 * Returns null when no content survives.
 */
export function createParsedRecord(candidate: RecordCandidate, limits: RecordLimits): ParsedRecord | null {
  const content = truncate(candidate.content, limits.maxContentLength).trim();
  if (!content) {
    return null;
  }

  const source = truncate(candidate.source ?? UNKNOWN_SOURCE, limits.maxSourceLength);

  let breachType = limits.defaultBreachType;
  if (candidate.breachType !== undefined) {
    breachType = isBreachType(candidate.breachType, limits.allowedBreachTypes)
      ? candidate.breachType
      : CATCH_ALL_BREACH_TYPE;
  }

  const author =
    candidate.author !== undefined ? truncate(stripUnsafeChars(candidate.author).trim(), limits.maxAuthorLength) : undefined;

  return Object.freeze({
    source,
    content,
    breachType,
    ...(author ? { author } : {}),
    contentHash: computeContentHash(content),
  });
}

export function attachMessage(record: ParsedRecord, meta: MessageMeta): BreachRecord {
  return Object.freeze({
    ...record,
    messageId: meta.messageId,
    timestamp: new Date(meta.timestamp.getTime()),
  });
}

export function serializeRecord(record: BreachRecord): PersistedRecord {
  return {
    Content: record.content,
    Source: record.source,
    Type: record.breachType,
    ...(record.author ? { Author: record.author } : {}),
    message_id: record.messageId,
    timestamp: record.timestamp.toISOString(),
    hash_id: record.contentHash,
  };
}

export interface RestoredRecord {
  record: BreachRecord;
  /** Stored hash_id present and different from the recomputed content hash. */
  hashMismatch: boolean;
}

/**
 * Rebuild a record loaded from the store, re-validating every field.
 */
export function restoreRecord(stored: StoredRecord, limits: RecordLimits): RestoredRecord | null {
  const parsed = createParsedRecord(
    {
      content: stored.Content,
      source: stored.Source,
      breachType: stored.Type,
      author: stored.Author,
    },
    limits,
  );
  if (!parsed) {
    return null;
  }

  return {
    record: attachMessage(parsed, { messageId: stored.message_id, timestamp: new Date(stored.timestamp) }),
    hashMismatch: stored.hash_id !== undefined && stored.hash_id !== parsed.contentHash,
  };
}
