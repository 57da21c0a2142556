/**
 * Text normalization for OCR output.
 *
 * Two flavours:
 * - `normalizeForMatching`: case-folds and strips accents one character at a
 *   time, never changing the UTF-16 length. Indices found in its output are
 *   valid offsets into the input.
 * - `normalizeText`: whitespace/punctuation cleanup for presentation. Not
 *   offset preserving.
 */

const COMBINING_MARKS = /[\u0300-\u036f]/g;

/**
 * Zero-width characters OCR engines leave behind.
 */
const ZERO_WIDTH_CHARS = /[\u200B\u200C\u200D\uFEFF]/g;

const foldCache = new Map<string, string>();

function foldChar(ch: string): string {
  const cached = foldCache.get(ch);
  if (cached !== undefined) return cached;

  let folded = ch;
  const stripped = ch.normalize('NFD').replace(COMBINING_MARKS, '');
  if (stripped.length === ch.length) {
    folded = stripped;
  }
  const upper = folded.toUpperCase();
  if (upper.length === folded.length) {
    folded = upper;
  }

  foldCache.set(ch, folded);
  return folded;
}

/**
 * Case-fold (upper) and strip accents, preserving length.
 * Characters whose folded form would have a different length (e.g. "ß")
 * are left untouched.
 */
export function normalizeForMatching(text: string): string {
  let out = '';
  for (const ch of text) {
    out += foldChar(ch);
  }
  return out;
}

/**
 * General cleanup for presenting OCR text:
 * NFC, unified line endings, no zero-width characters, tabs and form feeds
 * as spaces, no space before punctuation, runs of whitespace collapsed to
 * one space, trimmed. A single line break is kept.
 */
export function normalizeText(text: string): string {
  return text
    .normalize('NFC')
    .replace(/\r\n?/g, '\n')
    .replace(ZERO_WIDTH_CHARS, '')
    .replace(/[\t\f\v]/g, ' ')
    .replace(/\s+([,.;:])/g, '$1')
    .replace(/\s{2,}/g, ' ')
    .trim();
}
