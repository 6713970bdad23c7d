export { JsonFileStore, defaultBackupPath } from './json-store.js';
export { InMemoryStore } from './memory-store.js';
export { StoreWriteError } from './errors.js';
export { sortNewestFirst } from './sort.js';
export { persistedRecordSchema, storedRecordSchema } from './schema.js';

export type { PersistedRecord, StoredRecord } from './schema.js';
export type { RecordStore, StoreLogger, JsonFileStoreOptions } from './types.js';
