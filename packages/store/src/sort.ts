import type { PersistedRecord } from './schema.js';

/**
 * Newest first. Ties keep their incoming order.
 */
export function sortNewestFirst(records: PersistedRecord[]): PersistedRecord[] {
  return records
    .map((record, index) => ({ record, index, time: new Date(record.timestamp).getTime() }))
    .sort((a, b) => b.time - a.time || a.index - b.index)
    .map(({ record }) => record);
}
