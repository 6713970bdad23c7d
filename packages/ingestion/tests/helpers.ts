import { resolveIngestionConfig } from '../src/config.js';
import { attachMessage, createParsedRecord } from '../src/record.js';
import type { BreachRecord } from '../src/types.js';

export const config = resolveIngestionConfig();

export function makeRecord(
  content: string,
  messageId: number,
  overrides: { source?: string; timestamp?: string } = {},
): BreachRecord {
  const parsed = createParsedRecord({ content, source: overrides.source ?? 'example.org' }, config);
  if (!parsed) {
    throw new Error(`test record without content: ${JSON.stringify(content)}`);
  }

  return attachMessage(parsed, {
    messageId,
    timestamp: new Date(overrides.timestamp ?? `2024-01-${String(messageId).padStart(2, '0')}T00:00:00.000Z`),
  });
}
