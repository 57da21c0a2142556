/**
 * Section Extraction
 *
 * Locates a section of a document by its header aliases and slices its body
 * out of the original text. Matching happens on `normalizeForMatching`
 * output, whose indices line up with the original text.
 */

import { normalizeForMatching } from '../text/normalize';

/** [start, end) in the text; [-1, -1] when the section is absent */
export type SectionBounds = [start: number, end: number];

const NOT_FOUND: SectionBounds = [-1, -1];

function normalizeAliases(aliases: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const alias of aliases) {
    const normalized = normalizeForMatching(alias.trim());
    if (normalized.length > 0) seen.add(normalized);
  }
  return [...seen];
}

/**
 * Find where a section starts and ends.
 *
 * The start is the earliest occurrence of any start alias; when several
 * aliases begin at that index the longest one is the header. The end is the
 * earliest end alias found after that header, or the end of the text.
 *
 * @param normalizedText - Text already passed through normalizeForMatching
 */
export function findSectionBoundaries(
  normalizedText: string,
  startAliases: readonly string[],
  endAliases: readonly string[]
): SectionBounds {
  let start = -1;
  let headerLength = 0;

  for (const alias of normalizeAliases(startAliases)) {
    const index = normalizedText.indexOf(alias);
    if (index === -1) continue;
    if (start === -1 || index < start || (index === start && alias.length > headerLength)) {
      start = index;
      headerLength = alias.length;
    }
  }

  if (start === -1) return NOT_FOUND;

  let end = normalizedText.length;
  const searchFrom = start + headerLength;
  for (const alias of normalizeAliases(endAliases)) {
    const index = normalizedText.indexOf(alias, searchFrom);
    if (index !== -1 && index < end) {
      end = index;
    }
  }

  return [start, end];
}

/**
 * Remove the longest alias the content starts with, plus a following colon
 * and spaces. Content that does not start with an alias is returned as is.
 */
function stripHeader(content: string, aliases: readonly string[]): string {
  const normalizedContent = normalizeForMatching(content);
  const candidates = normalizeAliases(aliases).sort((a, b) => b.length - a.length);

  for (const alias of candidates) {
    if (normalizedContent.startsWith(alias)) {
      return content.slice(alias.length).replace(/^\s*:?\s*/, '');
    }
  }
  return content;
}

/**
 * Extract the body of a section from OCR text.
 *
 * @param text - Original text
 * @param startAliases - Header aliases that open the section
 * @param endAliases - Header aliases of the section that follows; empty means
 *   the section runs to the end of the text
 * @param includeHeader - Keep the matched header in the returned content
 * @returns Trimmed section content, or null when not found or empty
 */
export function extractSection(
  text: string,
  startAliases: readonly string[],
  endAliases: readonly string[],
  includeHeader = false
): string | null {
  if (startAliases.length === 0) return null;

  const [start, end] = findSectionBoundaries(normalizeForMatching(text), startAliases, endAliases);
  if (start === -1) return null;

  let content = text.slice(start, end);
  if (!includeHeader) {
    content = stripHeader(content, startAliases);
  }

  content = content.trim();
  return content.length > 0 ? content : null;
}
