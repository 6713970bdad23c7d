import type { PersistedRecord, StoredRecord } from './schema.js';

/**
 * Durable home of the record set. Implementations must leave the previous
 * state intact when a save fails part-way.
 */
export interface RecordStore {
  load(): Promise<StoredRecord[]>;
  save(records: PersistedRecord[]): Promise<void>;
}

/**
 * Logger used by the store; console when none is given.
 */
export interface StoreLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface JsonFileStoreOptions {
  path: string;
  /** Defaults to `<name>_backup.json` beside `path`. */
  backupPath?: string;
  backupEnabled?: boolean;
  logger?: StoreLogger;
}
