import { copyFile, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { storedRecordSchema, type PersistedRecord, type StoredRecord } from './schema.js';
import type { JsonFileStoreOptions, RecordStore, StoreLogger } from './types.js';
import { StoreWriteError } from './errors.js';
import { sortNewestFirst } from './sort.js';

const defaultLogger: StoreLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function defaultBackupPath(path: string): string {
  const ext = extname(path);
  return join(dirname(path), `${basename(path, ext)}_backup${ext || '.json'}`);
}

/**
 * Record store backed by a single JSON array file.
 *
 * - load: missing file → empty; unreadable or corrupt file → empty (logged).
 * - save: backup copy of the current file, then write-temp-and-rename.
 */
export class JsonFileStore implements RecordStore {
  readonly path: string;
  readonly backupPath: string;
  private readonly backupEnabled: boolean;
  private readonly logger: StoreLogger;

  constructor(options: JsonFileStoreOptions) {
    this.path = options.path;
    this.backupPath = options.backupPath ?? defaultBackupPath(options.path);
    this.backupEnabled = options.backupEnabled ?? true;
    this.logger = options.logger ?? defaultLogger;
  }

  async load(): Promise<StoredRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.info(`[store] No existing data at ${this.path}, starting fresh`);
      } else {
        this.logger.error(`[store] Failed to read ${this.path}: ${errorMessage(error)}; continuing with empty store`);
      }
      return [];
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      this.logger.error(`[store] Corrupt JSON in ${this.path}: ${errorMessage(error)}; continuing with empty store`);
      return [];
    }

    if (!Array.isArray(payload)) {
      this.logger.error(`[store] ${this.path} does not hold a JSON array; continuing with empty store`);
      return [];
    }

    const records: StoredRecord[] = [];
    let invalidCount = 0;
    for (const item of payload) {
      const result = storedRecordSchema.safeParse(item);
      if (result.success) {
        records.push(result.data);
      } else {
        invalidCount++;
      }
    }

    if (invalidCount > 0) {
      this.logger.warn(`[store] Skipped ${invalidCount} malformed records in ${this.path}`);
    }
    this.logger.info(`[store] Loaded ${records.length} existing records`);

    return records;
  }

  async save(records: PersistedRecord[]): Promise<void> {
    if (this.backupEnabled) {
      await this.createBackup();
    }

    const body = `${JSON.stringify(sortNewestFirst(records), null, 2)}\n`;
    const tmpPath = `${this.path}.tmp`;

    try {
      await writeFile(tmpPath, body, 'utf8');
      await rename(tmpPath, this.path);
    } catch (error) {
      await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(`[store] Could not remove ${tmpPath}: ${errorMessage(cleanupError)}`);
      });
      throw new StoreWriteError(this.path, error);
    }

    this.logger.info(`[store] Saved ${records.length} records to ${this.path}`);
  }

  private async createBackup(): Promise<void> {
    try {
      await copyFile(this.path, this.backupPath);
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw new StoreWriteError(this.backupPath, error);
    }

    this.logger.info(`[store] Backup written to ${this.backupPath}`);
  }
}
