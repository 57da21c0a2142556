/**
 * Expediente Extraction
 *
 * Finds case identifiers with the pattern catalog, rejects implausible
 * candidates, scores the rest by shape and surrounding context and picks the
 * best one.
 */

import { DEFAULT_VOCABULARY, type DocumentVocabulary } from '../../vocabulary';
import {
  BASE_SCORE,
  CONTEXT_RADIUS,
  EXPEDIENTE_PATTERNS,
  MAX_SCORE,
  SCORING_RULES,
} from './patterns';

export { EXPEDIENTE_PATTERNS, SCORING_RULES, type ExpedientePattern, type ScoringRule } from './patterns';

export const DEFAULT_MIN_SCORE = 0.6;

export interface ExpedienteMatch {
  /** Whole matched phrase, e.g. "No. Expediente EXP-2024-001" */
  fullMatch: string;
  /** Captured identifier as written */
  id: string;
  /** Offset of the full match in the text */
  index: number;
  pattern: string;
}

export interface ExpedienteCandidate extends ExpedienteMatch {
  normalized: string;
  score: number;
}

/**
 * Collapse whitespace, drop spaces around "/" and "-", uppercase.
 */
export function normalizeExpedienteFormat(value: string): string {
  return value
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/\s*([/-])\s*/g, '$1')
    .toUpperCase();
}

/**
 * Every match of every pattern, in pattern order then text order.
 */
export function extractExpedientePatterns(text: string): ExpedienteMatch[] {
  const matches: ExpedienteMatch[] = [];

  for (const { name, regex, captureGroup } of EXPEDIENTE_PATTERNS) {
    for (const match of text.matchAll(regex)) {
      const id = match[captureGroup];
      if (id === undefined || match.index === undefined) continue;
      matches.push({ fullMatch: match[0], id, index: match.index, pattern: name });
    }
  }

  return matches;
}

/**
 * Reject candidates that are too short or long, have no alphanumeric
 * character, or are a stopword.
 */
export function validateExpediente(
  candidate: string,
  stopwords: readonly string[] = DEFAULT_VOCABULARY.expedienteStopwords
): boolean {
  const stripped = candidate.trim();
  if (stripped.length < 3 || stripped.length > 50) return false;
  if (!/[\p{L}\p{N}]/u.test(stripped)) return false;
  return !stopwords.includes(stripped.toLowerCase());
}

/**
 * Score a candidate in [0, 1] from its shape and the text around it.
 */
export function scoreExpediente(
  candidate: string,
  context: string,
  contextKeywords: readonly string[] = DEFAULT_VOCABULARY.expedienteContextKeywords
): number {
  const input = { candidate, context, contextKeywords };
  let score = BASE_SCORE;

  for (const rule of SCORING_RULES) {
    if (rule.applies(input)) {
      score += rule.weight;
    }
  }

  // Two decimals keep sums like 0.5 + 0.2 + 0.1 + 0.1 exact
  return Math.min(MAX_SCORE, Math.round(score * 100) / 100);
}

function contextAround(text: string, match: ExpedienteMatch): string {
  const start = Math.max(0, match.index - CONTEXT_RADIUS);
  const end = Math.min(text.length, match.index + match.fullMatch.length + CONTEXT_RADIUS);
  return text.slice(start, end);
}

/**
 * Valid, scored candidates in discovery order.
 */
export function findExpedienteCandidates(
  text: string,
  vocabulary: DocumentVocabulary = DEFAULT_VOCABULARY
): ExpedienteCandidate[] {
  const candidates: ExpedienteCandidate[] = [];

  for (const match of extractExpedientePatterns(text)) {
    if (!validateExpediente(match.id, vocabulary.expedienteStopwords)) continue;

    candidates.push({
      ...match,
      normalized: normalizeExpedienteFormat(match.id),
      score: scoreExpediente(match.id, contextAround(text, match), vocabulary.expedienteContextKeywords),
    });
  }

  return candidates;
}

/**
 * Extract the most plausible expediente from text.
 *
 * Highest score wins; on a tie the candidate that appears first in the text
 * wins.
 *
 * @returns Normalized identifier, or null when no candidate reaches minScore
 */
export function extractExpediente(
  text: string,
  minScore: number = DEFAULT_MIN_SCORE,
  vocabulary: DocumentVocabulary = DEFAULT_VOCABULARY
): string | null {
  let best: ExpedienteCandidate | null = null;

  for (const candidate of findExpedienteCandidates(text, vocabulary)) {
    if (candidate.score < minScore) continue;
    if (
      best === null ||
      candidate.score > best.score ||
      (candidate.score === best.score && candidate.index < best.index)
    ) {
      best = candidate;
    }
  }

  return best ? best.normalized : null;
}
