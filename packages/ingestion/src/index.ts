// Pipeline
export { ingestBatch } from './pipeline.js';

// Individual stages
export { normalizeText, stripWatermarks, unescapeLiterals, stripUnsafeChars, truncate } from './normalize.js';
export { createClassifier, countIndicators, DEFAULT_VOCABULARY } from './classify.js';
export { createRecordParser, decodeStructured } from './parse.js';
export { computeContentHash, CONTENT_HASH_LENGTH } from './fingerprint.js';
export { createParsedRecord, attachMessage, serializeRecord, restoreRecord } from './record.js';
export { mergeRecords } from './dedup.js';

// Configuration
export {
  resolveIngestionConfig,
  isBreachType,
  BREACH_TYPES,
  DEFAULT_BREACH_TYPE,
  CATCH_ALL_BREACH_TYPE,
  UNKNOWN_SOURCE,
  DEFAULT_MAX_CONTENT_LENGTH,
  DEFAULT_MAX_SOURCE_LENGTH,
  DEFAULT_MAX_AUTHOR_LENGTH,
  DEFAULT_MAX_STORED_RECORDS,
  DEFAULT_WATERMARKS,
  DEFAULT_BREACH_INDICATORS,
  DEFAULT_SPAM_INDICATORS,
} from './config.js';
export { ConfigError } from './errors.js';

// Types
export type { BreachType, IngestionConfig, ResolvedIngestionConfig } from './config.js';
export type { KeywordVocabulary, Classification, ContentClassifier } from './classify.js';
export type { RecordParser, RecordParserOptions } from './parse.js';
export type { MessageMeta, RestoredRecord } from './record.js';
export type { MergeOptions, MergeResult, MergeStats } from './dedup.js';
export type {
  ParsedRecord,
  BreachRecord,
  RecordCandidate,
  ParseFormat,
  ParseRejection,
  ParseOutcome,
  BatchStageStats,
  BatchIngestionResult,
  IngestBatchOptions,
  IngestionLogger,
} from './types.js';
