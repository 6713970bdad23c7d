import { createHash } from 'node:crypto';

export const CONTENT_HASH_LENGTH = 16;

/**
 * Dedup identity of a record: first 16 hex chars of SHA-256 over the UTF-8 content.
 * Content only: records hashed under any other composition will not match
 * (restoreRecord reports them as hash mismatches).
 */
export function computeContentHash(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex').slice(0, CONTENT_HASH_LENGTH);
}
