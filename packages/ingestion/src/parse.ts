import { resolveIngestionConfig, type ResolvedIngestionConfig } from './config.js';
import { createClassifier, type ContentClassifier } from './classify.js';
import { normalizeText, stripWatermarks, truncate } from './normalize.js';
import { createParsedRecord } from './record.js';
import type { IngestionLogger, ParseOutcome, ParsedRecord, RecordCandidate } from './types.js';

/** A JSON string literal may wrap the payload once; deeper nesting is treated as plain text. */
const MAX_DECODE_ATTEMPTS = 2;
const LOG_PREVIEW_LENGTH = 100;
const LINE_BREAKS = /\r?\n/g;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Decode text into a JSON object, unwrapping one level of string encoding.
 * Anything that is not an object after at most two decodes yields null.
 */
export function decodeStructured(text: string): JsonRecord | null {
  let current = text;

  for (let attempt = 0; attempt < MAX_DECODE_ATTEMPTS; attempt++) {
    let decoded: unknown;
    try {
      decoded = JSON.parse(current);
    } catch {
      return null;
    }

    if (typeof decoded === 'string') {
      current = decoded;
      continue;
    }

    return isRecord(decoded) ? decoded : null;
  }

  return null;
}

export interface RecordParserOptions {
  config?: ResolvedIngestionConfig;
  classifier?: ContentClassifier;
  logger?: Pick<IngestionLogger, 'debug'>;
}

export interface RecordParser {
  /** Parse one message text; null when the message yields no relevant record. */
  parse(rawText: unknown): ParsedRecord | null;
  inspect(rawText: unknown): ParseOutcome;
}

/**
 * Message text → validated record.
 *
 * Text is capped at maxContentLength before any decoding, so an oversized JSON
 * payload falls through to the plain-text path. Decoding runs on the
 * watermark-free text; the unsafe-character strip would otherwise destroy the
 * JSON quoting. Decoded string fields are normalized afterwards.
 */
export function createRecordParser(options: RecordParserOptions = {}): RecordParser {
  const config = options.config ?? resolveIngestionConfig();
  const classifier =
    options.classifier ??
    createClassifier({ breachIndicators: config.breachIndicators, spamIndicators: config.spamIndicators });
  const logger = options.logger;

  // JSON.parse has already turned `\n` escapes into real line breaks.
  const normalizeDecoded = (value: string): string =>
    normalizeText(value.replace(LINE_BREAKS, ' '), config.watermarks);

  const toCandidate = (mapping: JsonRecord, normalized: string): RecordCandidate => {
    const content = asString(mapping.Content);
    const source = asString(mapping.Source);
    const author = asString(mapping.Author);

    return {
      content: content !== undefined ? normalizeDecoded(content) : normalized,
      source: source !== undefined ? normalizeDecoded(source) : undefined,
      breachType: mapping.Type,
      author: author?.replace(LINE_BREAKS, ' '),
    };
  };

  const inspect = (rawText: unknown): ParseOutcome => {
    if (typeof rawText !== 'string') {
      return { status: 'rejected', reason: 'not_text' };
    }

    const normalized = truncate(normalizeText(rawText, config.watermarks), config.maxContentLength);
    if (!normalized) {
      return { status: 'rejected', reason: 'empty' };
    }

    const prepared = truncate(stripWatermarks(rawText, config.watermarks).trim(), config.maxContentLength);
    const mapping = decodeStructured(prepared);
    if (!mapping && config.structuredOnly) {
      return { status: 'rejected', reason: 'not_structured' };
    }
    const format = mapping ? 'structured' : 'plain';
    const candidate: RecordCandidate = mapping ? toCandidate(mapping, normalized) : { content: normalized };

    const record = createParsedRecord(candidate, config);
    if (!record) {
      return { status: 'rejected', reason: 'empty' };
    }

    if (!classifier.isRelevant(record.content)) {
      logger?.debug(`[parse] Skipping non-relevant message: ${record.content.slice(0, LOG_PREVIEW_LENGTH)}`);
      return { status: 'rejected', reason: 'irrelevant' };
    }

    return { status: 'parsed', record, format };
  };

  return {
    inspect,
    parse: (rawText) => {
      const outcome = inspect(rawText);
      return outcome.status === 'parsed' ? outcome.record : null;
    },
  };
}
