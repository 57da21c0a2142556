/**
 * Expediente Patterns
 *
 * Declarative catalog of the phrasings that introduce a case identifier in
 * Spanish legal documents, and of the rules that score a candidate.
 */

/**
 * An identifier: alphanumeric runs joined by "/", "-" or ".". Spaces or tabs
 * around "/" and "-" are taken only when the next run has a digit, so a
 * dash before "Juzgado ..." ends the identifier. Never spans lines.
 */
const ID = String.raw`([A-Z0-9]+(?:[ \t]*[/-][ \t]*(?=[A-Z0-9]*\d)[A-Z0-9]+|[/-][A-Z0-9]+|\.[A-Z0-9]+)*)`;

export interface ExpedientePattern {
  name: string;
  regex: RegExp;
  /** Capture group holding the identifier */
  captureGroup: number;
}

function pattern(name: string, source: string): ExpedientePattern {
  return { name, regex: new RegExp(source, 'gi'), captureGroup: 1 };
}

/**
 * Ordered; the same identifier may be found by more than one pattern.
 */
export const EXPEDIENTE_PATTERNS: readonly ExpedientePattern[] = [
  // "Expediente: 123/2024", "Expediente # 45"
  pattern('expediente_label', String.raw`\bexpediente\s*[:#]\s*${ID}`),
  // "No. Expediente EXP-2024-001", "Número de expediente: 7"
  pattern('no_expediente', String.raw`\b(?:no|n[uú]m(?:ero)?)\.?\s*(?:de\s+)?expediente\s*[:#]?\s*${ID}`),
  // "Exp. No. 123/2024", "Exped. 45-B"
  pattern('exp_abbreviation', String.raw`\bexp(?:ed)?\.\s*(?:(?:no|n[uú]m)\b\.?|#)?\s*[:#]?\s*${ID}`),
  // "Expediente Num. 88", "Expediente número 88"
  pattern('expediente_num', String.raw`\bexpediente\s+(?:n[uú]m(?:ero)?|no)\b\.?\s*[:#]?\s*${ID}`),
  // "Expediente ABC-1" (low precision, left to scoring)
  pattern('expediente_bare', String.raw`\bexpediente\s+${ID}`),
];

export interface ScoringInput {
  candidate: string;
  /** Text around the match */
  context: string;
  /** Lower-case judicial context keywords */
  contextKeywords: readonly string[];
}

export interface ScoringRule {
  name: string;
  weight: number;
  applies: (input: ScoringInput) => boolean;
}

export const BASE_SCORE = 0.5;
export const MAX_SCORE = 1.0;

const YEAR = /(?<!\d)(?:19|20)\d{2}(?!\d)/;

export const SCORING_RULES: readonly ScoringRule[] = [
  { name: 'has_digit', weight: 0.2, applies: ({ candidate }) => /\d/.test(candidate) },
  { name: 'has_year', weight: 0.1, applies: ({ candidate }) => YEAR.test(candidate) },
  { name: 'has_separator', weight: 0.1, applies: ({ candidate }) => /[/-]/.test(candidate) },
  {
    name: 'judicial_context',
    weight: 0.1,
    applies: ({ context, contextKeywords }) => {
      const lower = context.toLowerCase();
      return contextKeywords.some((keyword) => lower.includes(keyword));
    },
  },
];

/** Characters of context taken on each side of a match */
export const CONTEXT_RADIUS = 50;
