/**
 * Extractors Module
 *
 * Deterministic, total extractors over OCR text plus the aggregator that
 * composes them.
 */

export { findSectionBoundaries, extractSection, type SectionBounds } from './section';

export {
  normalizeExpedienteFormat,
  extractExpedientePatterns,
  validateExpediente,
  scoreExpediente,
  findExpedienteCandidates,
  extractExpediente,
  DEFAULT_MIN_SCORE,
  EXPEDIENTE_PATTERNS,
  SCORING_RULES,
  type ExpedienteMatch,
  type ExpedienteCandidate,
  type ExpedientePattern,
  type ScoringRule,
} from './expediente';

export {
  extractDates,
  isValidCalendarDate,
  isIsoDateString,
  DATE_PATTERNS,
  type DatePattern,
  type DateFormat,
} from './dates';

export { extractAmounts, parseAmount } from './amounts';

export { extractStructuredFields, scaleConfidence } from './fields';
