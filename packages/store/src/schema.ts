import { z } from 'zod';

function isParseableDate(value: string): boolean {
  return !Number.isNaN(new Date(value).getTime());
}

/**
 * Shape written to the data file. Capitalized keys come from the channel's own
 * JSON payloads; lowercase keys are added by the fetcher.
 */
export const persistedRecordSchema = z.object({
  Content: z.string().min(1),
  Source: z.string(),
  Type: z.string(),
  Author: z.string().optional(),
  message_id: z.number().int(),
  timestamp: z.string().refine(isParseableDate, { message: 'Invalid timestamp' }),
  hash_id: z.string().min(1),
});

export type PersistedRecord = z.infer<typeof persistedRecordSchema>;

/**
 * Older data files may lack Source/Type/hash_id or carry arbitrary Type values.
 * Loading accepts them; the ingestion pipeline re-validates every field.
 */
export const storedRecordSchema = persistedRecordSchema.extend({
  Content: z.string(),
  Source: z.string().optional(),
  Type: z.string().optional(),
  hash_id: z.string().optional(),
});

export type StoredRecord = z.infer<typeof storedRecordSchema>;
