import type { MessageSource } from './types.js';

/**
 * Typed helper for source definitions.
 * Keeps source declarations consistent without runtime overhead.
 */
export function defineSource<T extends MessageSource>(source: T): T {
  return source;
}
