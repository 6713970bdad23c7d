import type { ContentClassifier } from './classify.js';
import type { BreachRecord } from './types.js';

export interface MergeOptions {
  classifier: ContentClassifier;
  maxRecords: number;
  /** Incoming records already passed the classifier at parse time. */
  incomingClassified?: boolean;
}

export interface MergeStats {
  prunedExisting: number;
  duplicateExisting: number;
  irrelevantIncoming: number;
  duplicateIncoming: number;
  capped: number;
  /** Part of `capped` that were stored records. */
  cappedExisting: number;
  added: number;
}

export interface MergeResult {
  records: BreachRecord[];
  stats: MergeStats;
}

/**
 * Merge stored records with a new batch by content hash.
 *
 * - Existing records are visited first, so the first-seen copy always wins.
 * - Existing records that no longer pass the classifier are pruned.
 * - Output beyond maxRecords is cut from the tail, so incoming records are dropped before existing ones.
 *
 * Pure: no I/O, inputs untouched.
 */
export function mergeRecords(
  existing: readonly BreachRecord[],
  incoming: readonly BreachRecord[],
  options: MergeOptions,
): MergeResult {
  const { classifier, maxRecords, incomingClassified = false } = options;
  const stats: MergeStats = {
    prunedExisting: 0,
    duplicateExisting: 0,
    irrelevantIncoming: 0,
    duplicateIncoming: 0,
    capped: 0,
    cappedExisting: 0,
    added: 0,
  };

  const seenHashes = new Set<string>();
  const merged: Array<{ record: BreachRecord; incoming: boolean }> = [];

  for (const record of existing) {
    if (!classifier.isRelevant(record.content)) {
      stats.prunedExisting++;
      continue;
    }
    if (seenHashes.has(record.contentHash)) {
      stats.duplicateExisting++;
      continue;
    }
    seenHashes.add(record.contentHash);
    merged.push({ record, incoming: false });
  }

  for (const record of incoming) {
    if (!incomingClassified && !classifier.isRelevant(record.content)) {
      stats.irrelevantIncoming++;
      continue;
    }
    if (seenHashes.has(record.contentHash)) {
      stats.duplicateIncoming++;
      continue;
    }
    seenHashes.add(record.contentHash);
    merged.push({ record, incoming: true });
  }

  const kept = merged.length > maxRecords ? merged.slice(0, maxRecords) : merged;
  stats.capped = merged.length - kept.length;
  stats.cappedExisting = merged.slice(kept.length).filter((entry) => !entry.incoming).length;
  stats.added = kept.filter((entry) => entry.incoming).length;

  return {
    records: kept.map((entry) => entry.record),
    stats,
  };
}
