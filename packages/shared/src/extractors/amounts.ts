/**
 * Amount Extraction
 *
 * Finds monetary amounts next to a currency marker ("$1,234.56",
 * "USD 1,000.00", "1.500,00 €") or after an amount keyword ("Monto: 2,500").
 * Negative, parenthesized and unparsable amounts are discarded.
 */

import { createAmountData, DEFAULT_CURRENCY } from '../models';
import type { AmountData } from '../types';
import { DEFAULT_VOCABULARY, type CurrencyMarker } from '../vocabulary';

/**
 * Grouped digits with an optional 1-2 digit decimal part, or a plain run of
 * digits with an optional decimal part.
 */
const NUMBER = String.raw`(?<num>\d{1,3}(?:[., ]\d{3})+(?:[.,]\d{1,2})?|\d+(?:[.,]\d{1,2})?)(?![\d])`;
const SIGN = String.raw`(?:(?<open>\()\s*|(?<minus>-))?`;
const CLOSE = String.raw`(?<close>\s*\))?`;

type AmountForm = 'prefix' | 'suffix' | 'keyword';

interface AmountPattern {
  regex: RegExp;
  currency: string;
  form: AmountForm;
  /** Lower wins on overlapping matches */
  priority: number;
}

interface AmountMatch {
  start: number;
  end: number;
  priority: number;
  formRank: number;
  amount: AmountData | null;
}

const FORM_RANK: Record<AmountForm, number> = { prefix: 0, suffix: 1, keyword: 2 };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function markerSource(marker: string): string {
  const escaped = escapeRegExp(marker);
  // Letter codes must not be part of a longer word
  return /^[A-Za-z]+$/.test(marker) ? String.raw`(?<![A-Za-z])${escaped}(?![A-Za-z])` : escaped;
}

function buildPatterns(
  currencies: readonly CurrencyMarker[],
  amountKeywords: readonly string[]
): AmountPattern[] {
  const patterns: AmountPattern[] = [];

  currencies.forEach(({ marker, code }, priority) => {
    if (marker.trim().length === 0) return;
    const source = markerSource(marker);
    patterns.push({
      regex: new RegExp(String.raw`${SIGN}${source}\s*(?<inner>-)?\s*${NUMBER}${CLOSE}`, 'g'),
      currency: code,
      form: 'prefix',
      priority,
    });
    patterns.push({
      regex: new RegExp(String.raw`(?<![\d.,])${SIGN}${NUMBER}\s*${source}${CLOSE}`, 'g'),
      currency: code,
      form: 'suffix',
      priority,
    });
  });

  const keywords = amountKeywords.filter((keyword) => keyword.trim().length > 0).map(escapeRegExp);
  if (keywords.length > 0) {
    patterns.push({
      regex: new RegExp(
        String.raw`\b(?:${keywords.join('|')})\b(?:\s+(?:de|del|a pagar))?\s*[:=]?\s*${SIGN}${NUMBER}${CLOSE}`,
        'gi'
      ),
      currency: DEFAULT_CURRENCY,
      form: 'keyword',
      priority: currencies.length,
    });
  }

  return patterns;
}

/**
 * Parse a number written with "," or "." (or spaces) as separators.
 *
 * With both "," and "." the last one is the decimal mark. With only one of
 * them, it is a decimal mark when it occurs once and is followed by one or
 * two digits; otherwise it groups thousands.
 *
 * @returns The value, or null when the text is not a number
 */
export function parseAmount(raw: string): number | null {
  const compact = raw.replace(/\s/g, '');
  if (!/^\d[\d.,]*$/.test(compact)) return null;

  const lastComma = compact.lastIndexOf(',');
  const lastDot = compact.lastIndexOf('.');
  let decimalMark: ',' | '.' | null = null;

  if (lastComma >= 0 && lastDot >= 0) {
    decimalMark = lastComma > lastDot ? ',' : '.';
  } else if (lastComma >= 0 || lastDot >= 0) {
    const mark = lastComma >= 0 ? ',' : '.';
    const occurrences = compact.split(mark).length - 1;
    const decimals = compact.length - compact.lastIndexOf(mark) - 1;
    if (occurrences === 1 && decimals >= 1 && decimals <= 2) {
      decimalMark = mark;
    }
  }

  let normalized: string;
  if (decimalMark === null) {
    normalized = compact.replace(/[.,]/g, '');
  } else {
    const index = compact.lastIndexOf(decimalMark);
    normalized = `${compact.slice(0, index).replace(/[.,]/g, '')}.${compact.slice(index + 1)}`;
  }

  const value = Number(normalized);
  return Number.isFinite(value) ? value : null;
}

function toAmountMatch(match: RegExpMatchArray, pattern: AmountPattern): AmountMatch | null {
  const groups = match.groups;
  const num = groups?.num;
  if (match.index === undefined || num === undefined) return null;

  const parenthesized = groups?.open !== undefined && groups?.close !== undefined;
  const negative = groups?.minus !== undefined || groups?.inner !== undefined || parenthesized;
  const value = parseAmount(num);

  return {
    start: match.index,
    end: match.index + match[0].length,
    priority: pattern.priority,
    formRank: FORM_RANK[pattern.form],
    // A negative match still claims its span so no other pattern re-reads it
    amount: negative || value === null ? null : createAmountData(value, pattern.currency, match[0].trim()),
  };
}

/**
 * Extract amounts from text.
 *
 * Overlapping matches go to the currency listed first; keyword matches come
 * last and are reported in MXN.
 *
 * @returns Amounts ordered by position in the text
 */
export function extractAmounts(
  text: string,
  currencies: readonly CurrencyMarker[] = DEFAULT_VOCABULARY.currencies,
  amountKeywords: readonly string[] = DEFAULT_VOCABULARY.amountKeywords
): AmountData[] {
  const matches: AmountMatch[] = [];

  for (const pattern of buildPatterns(currencies, amountKeywords)) {
    for (const match of text.matchAll(pattern.regex)) {
      const candidate = toAmountMatch(match, pattern);
      if (candidate) matches.push(candidate);
    }
  }

  matches.sort((a, b) => a.priority - b.priority || a.formRank - b.formRank || a.start - b.start);

  const accepted: AmountMatch[] = [];
  for (const candidate of matches) {
    const overlaps = accepted.some((other) => candidate.start < other.end && other.start < candidate.end);
    if (!overlaps) accepted.push(candidate);
  }

  accepted.sort((a, b) => a.start - b.start);

  const amounts: AmountData[] = [];
  for (const { amount } of accepted) {
    if (amount) amounts.push(amount);
  }
  return amounts;
}
