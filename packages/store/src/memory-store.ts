import type { PersistedRecord, StoredRecord } from './schema.js';
import type { RecordStore } from './types.js';
import { sortNewestFirst } from './sort.js';

/**
 * Process-local store for dry runs and tests.
 */
export class InMemoryStore implements RecordStore {
  private records: StoredRecord[];
  saveCount = 0;

  constructor(initial: StoredRecord[] = []) {
    this.records = [...initial];
  }

  async load(): Promise<StoredRecord[]> {
    return [...this.records];
  }

  async save(records: PersistedRecord[]): Promise<void> {
    this.records = sortNewestFirst(records);
    this.saveCount++;
  }

  snapshot(): StoredRecord[] {
    return [...this.records];
  }
}
