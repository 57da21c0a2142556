/**
 * Date Extraction
 *
 * Finds calendar dates written in Spanish ("15 de octubre de 2023",
 * "15/10/2023") or ISO ("2023-10-15") form and returns them as canonical
 * YYYY-MM-DD strings. Impossible dates are dropped; nothing here throws.
 */

import { normalizeForMatching } from '../text/normalize';
import { DEFAULT_VOCABULARY } from '../vocabulary';

export type DateFormat = 'spanish' | 'iso';

interface DateParts {
  year: number;
  month: number;
  day: number;
}

export interface DatePattern {
  name: string;
  format: DateFormat;
  regex: RegExp;
  toParts: (match: RegExpMatchArray, months: Record<string, number>) => DateParts | null;
}

function toInt(value: string | undefined): number {
  return value === undefined ? NaN : parseInt(value, 10);
}

export const DATE_PATTERNS: readonly DatePattern[] = [
  {
    // "15 de octubre de 2023", "1 de Septiembre del 2024"
    name: 'spanish_long',
    format: 'spanish',
    regex: /(?<!\d)(\d{1,2})\s+de\s+([A-Za-zÁÉÍÓÚáéíóúÑñ]+)\s+del?\s+(\d{4})(?!\d)/gi,
    toParts: (match, months) => {
      const monthName = normalizeForMatching(match[2] ?? '').toLowerCase();
      const month = months[monthName];
      if (month === undefined) return null;
      return { year: toInt(match[3]), month, day: toInt(match[1]) };
    },
  },
  {
    // "15/10/2023", "15-10-2023", "15.10.2023"
    name: 'spanish_numeric',
    format: 'spanish',
    regex: /(?<!\d)(\d{1,2})([/.-])(\d{1,2})\2(\d{4})(?!\d)/g,
    toParts: (match) => ({ year: toInt(match[4]), month: toInt(match[3]), day: toInt(match[1]) }),
  },
  {
    // "2023-10-15", "2023/10/15"
    name: 'iso',
    format: 'iso',
    regex: /(?<!\d)(\d{4})([/-])(\d{2})\2(\d{2})(?!\d)/g,
    toParts: (match) => ({ year: toInt(match[1]), month: toInt(match[3]), day: toInt(match[4]) }),
  },
];

/**
 * True when the parts name a real day of the Gregorian calendar.
 */
export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false;
  if (year < 1000 || year > 9999 || month < 1 || month > 12 || day < 1) return false;

  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

function formatIsoDate({ year, month, day }: DateParts): string {
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * True for a canonical "YYYY-MM-DD" string naming a real date.
 */
export function isIsoDateString(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return false;
  return isValidCalendarDate(toInt(match[1]), toInt(match[2]), toInt(match[3]));
}

/**
 * Extract dates in the requested formats.
 *
 * @returns Canonical dates, deduplicated, in order of first appearance
 */
export function extractDates(
  text: string,
  extractSpanish = true,
  extractIso = true,
  months: Record<string, number> = DEFAULT_VOCABULARY.months
): string[] {
  const found: Array<{ index: number; date: string }> = [];

  for (const pattern of DATE_PATTERNS) {
    if (pattern.format === 'spanish' && !extractSpanish) continue;
    if (pattern.format === 'iso' && !extractIso) continue;

    for (const match of text.matchAll(pattern.regex)) {
      const parts = pattern.toParts(match, months);
      if (!parts || !isValidCalendarDate(parts.year, parts.month, parts.day)) continue;
      found.push({ index: match.index ?? 0, date: formatIsoDate(parts) });
    }
  }

  found.sort((a, b) => a.index - b.index);

  const seen = new Set<string>();
  const dates: string[] = [];
  for (const { date } of found) {
    if (seen.has(date)) continue;
    seen.add(date);
    dates.push(date);
  }
  return dates;
}
