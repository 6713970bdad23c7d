export type Env = Record<string, string | undefined>;

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

const DEFAULT_CHANNEL = 'breachdetector';
const DEFAULT_MESSAGE_LIMIT = 5000;
const DEFAULT_DATA_FILE = 'data.json';
const DEFAULT_BACKUP_FILE = 'data_backup.json';
const DEFAULT_MAX_STORED_RECORDS = 10_000;
const CHANNEL_PATTERN = /^[A-Za-z0-9_]+$/;

export interface FetcherConfig {
  exportPath: string;
  channel: string;
  messageLimit: number;
  dataFile: string;
  backupFile: string;
  backupEnabled: boolean;
  maxStoredRecords: number;
  /** Keep only messages carrying a JSON payload. */
  structuredOnly: boolean;
  dryRun: boolean;
}

export function readRequiredEnv(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new EnvConfigError(`${name} environment variable is required`);
  }

  return value;
}

export function readIntEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return Math.floor(parsed);
}

export function readBoolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }

  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }

  return fallback;
}

export function loadFetcherConfig(env: Env = process.env): FetcherConfig {
  const channel = env.CHANNEL?.trim() || DEFAULT_CHANNEL;
  if (!CHANNEL_PATTERN.test(channel)) {
    throw new EnvConfigError(`CHANNEL must be a channel username (letters, digits, underscore), got "${channel}"`);
  }

  return {
    exportPath: readRequiredEnv(env, 'EXPORT_PATH'),
    channel,
    messageLimit: readIntEnv(env, 'MESSAGE_LIMIT', DEFAULT_MESSAGE_LIMIT),
    dataFile: env.DATA_FILE?.trim() || DEFAULT_DATA_FILE,
    backupFile: env.BACKUP_FILE?.trim() || DEFAULT_BACKUP_FILE,
    backupEnabled: readBoolEnv(env, 'BACKUP_ENABLED', true),
    maxStoredRecords: readIntEnv(env, 'MAX_STORED_RECORDS', DEFAULT_MAX_STORED_RECORDS),
    structuredOnly: readBoolEnv(env, 'STRUCTURED_ONLY', false),
    dryRun: readBoolEnv(env, 'DRY_RUN', false),
  };
}
