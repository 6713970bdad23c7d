import { DEFAULT_WATERMARKS } from './config.js';

const UNSAFE_CHARS = /[<>"']/g;

/**
 * Remove every occurrence of each watermark (exact, case-sensitive match).
 */
export function stripWatermarks(text: string, watermarks: readonly string[] = DEFAULT_WATERMARKS): string {
  let result = text;
  for (const watermark of watermarks) {
    if (watermark) {
      result = result.split(watermark).join('');
    }
  }
  return result;
}

/**
 * Transport payloads carry literal `\n` and `\"` sequences (backslash + char),
 * not control characters.
 */
export function unescapeLiterals(text: string): string {
  return text.replaceAll('\\n', ' ').replaceAll('\\"', '"');
}

/**
 * Drop angle brackets and quotes so downstream HTML renderers get inert text.
 */
export function stripUnsafeChars(text: string): string {
  return text.replace(UNSAFE_CHARS, '');
}

/**
 * Full message cleanup: watermarks, escape sequences, unsafe characters, outer
 * whitespace. Non-string input yields ''.
 * Never throws.
 */
export function normalizeText(raw: unknown, watermarks: readonly string[] = DEFAULT_WATERMARKS): string {
  if (typeof raw !== 'string') {
    return '';
  }

  return stripUnsafeChars(unescapeLiterals(stripWatermarks(raw, watermarks))).trim();
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}
