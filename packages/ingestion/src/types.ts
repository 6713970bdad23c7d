import type { BreachType, IngestionConfig } from './config.js';
import type { ContentClassifier } from './classify.js';

/**
 * Validated record content, before the originating message is attached.
 */
export interface ParsedRecord {
  readonly source: string;
  readonly content: string;
  readonly breachType: BreachType;
  readonly author?: string;
  readonly contentHash: string;
}

/**
 * Fully constructed, immutable breach record.
 */
export interface BreachRecord extends ParsedRecord {
  readonly messageId: number;
  readonly timestamp: Date;
}

/**
 * Unvalidated field values headed for createParsedRecord.
 */
export interface RecordCandidate {
  content: string;
  source?: string;
  breachType?: unknown;
  author?: string;
}

export type ParseFormat = 'structured' | 'plain';

export type ParseRejection = 'not_text' | 'empty' | 'not_structured' | 'irrelevant';

/**
 * Outcome of parsing a single message text.
 */
export type ParseOutcome =
  | { status: 'parsed'; record: ParsedRecord; format: ParseFormat }
  | { status: 'rejected'; reason: ParseRejection };

/**
 * Per-stage counts for observability.
 */
export interface BatchStageStats {
  received: number;
  validationDropped: number;
  parsed: number;
  /** Parsed records that came from a JSON payload. */
  structured: number;
  parseDropped: number;
  /** Plain-text messages rejected under `structuredOnly`. */
  plainDropped: number;
  relevanceDropped: number;
  existing: number;
  existingInvalid: number;
  hashMismatches: number;
  prunedExisting: number;
  duplicates: number;
  capped: number;
  added: number;
  stored: number;
}

export interface BatchIngestionResult {
  sourceId: string;
  stats: BatchStageStats;
  saved: boolean;
  errors: string[];
  durationMs: number;
}

export interface IngestBatchOptions {
  sourceId?: string;
  config?: IngestionConfig;
  classifier?: ContentClassifier;
  logger?: IngestionLogger;
  /** Maximum number of messages consumed from the input sequence. */
  limit?: number;
  /** Merge without writing the store. */
  dryRun?: boolean;
}

/**
 * Stage logger; `ingestBatch` falls back to console.
 */
export interface IngestionLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
