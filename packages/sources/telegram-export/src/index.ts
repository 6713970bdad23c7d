import { readFile } from 'node:fs/promises';
import { defineSource, type FetchOptions, type FetchResult, type MessageSource, type RawMessage } from '@breachfeed/source-sdk';

type JsonRecord = Record<string, unknown>;

export class TelegramExportError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TelegramExportError';
  }
}

export interface TelegramExportSourceOptions {
  /** Path to the `result.json` written by Telegram Desktop's export. */
  path: string;
  /** Channel username, used for the source id. */
  channel?: string;
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function asPositiveInt(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : undefined;
}

/**
 * Exports write `text` as a plain string, or as a list mixing strings and
 * formatting entities (`{ type: 'bold', text: '...' }`).
 */
export function flattenText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (!Array.isArray(value)) {
    return '';
  }

  return value
    .map((part) => {
      if (typeof part === 'string') {
        return part;
      }
      return isRecord(part) ? (asString(part.text) ?? '') : '';
    })
    .join('');
}

function parseTimestamp(unixRaw: unknown, dateRaw: unknown): Date | undefined {
  const unix = asString(unixRaw);
  if (unix && /^\d+$/.test(unix)) {
    return new Date(Number(unix) * 1000);
  }

  const date = asString(dateRaw);
  if (date) {
    // Local export time without a zone; read it as UTC.
    const parsed = new Date(/(?:[zZ]|[+-]\d{2}:?\d{2})$/.test(date) ? date : `${date}Z`);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed;
    }
  }

  return undefined;
}

function toRawMessage(value: unknown): RawMessage | null {
  if (!isRecord(value) || value.type !== 'message') {
    return null;
  }

  const id = asPositiveInt(value.id);
  const timestamp = parseTimestamp(value.date_unixtime, value.date);
  const text = flattenText(value.text);
  if (id === undefined || !timestamp || !text) {
    return null;
  }

  return { id, text, timestamp };
}

/**
 * Map an export payload to channel messages, newest first.
 */
export function parseExport(payload: unknown, path = '<export>'): RawMessage[] {
  if (!isRecord(payload) || !Array.isArray(payload.messages)) {
    throw new TelegramExportError(`${path} is not a Telegram channel export (missing "messages" array)`, path);
  }

  return payload.messages
    .map(toRawMessage)
    .filter((message): message is RawMessage => message !== null)
    .sort((a, b) => b.id - a.id);
}

export async function readExport(path: string): Promise<RawMessage[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new TelegramExportError(`Cannot read Telegram export ${path}`, path, { cause: error });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(content);
  } catch (error) {
    throw new TelegramExportError(`Telegram export ${path} is not valid JSON`, path, { cause: error });
  }

  return parseExport(payload, path);
}

export function createTelegramExportSource(options: TelegramExportSourceOptions): MessageSource {
  const channel = options.channel ?? 'breachdetector';

  return defineSource({
    manifest: {
      id: `telegram-export:${channel}`,
      name: `Telegram export (@${channel})`,
      version: '0.1.0',
      schedule: '0 */6 * * *',
    },
    async fetch(fetchOptions: FetchOptions = {}): Promise<FetchResult> {
      const messages = await readExport(options.path);
      const { limit } = fetchOptions;

      return { messages: limit !== undefined ? messages.slice(0, limit) : messages };
    },
  });
}
