/**
 * Field Aggregation
 *
 * Composes the extractors into one ExtractedFields record for a page.
 */

import { createExtractedFields } from '../models';
import { normalizeText } from '../text/normalize';
import type { ExtractedFields } from '../types';
import { DEFAULT_VOCABULARY, type DocumentVocabulary } from '../vocabulary';
import { extractAmounts } from './amounts';
import { extractDates } from './dates';
import { extractExpediente } from './expediente';
import { extractSection } from './section';

/**
 * OCR confidence (0..100) on a 0..1 scale, three decimals.
 */
export function scaleConfidence(confidence: number): number | null {
  if (!Number.isFinite(confidence)) return null;
  const clamped = Math.min(100, Math.max(0, confidence));
  return Math.round((clamped / 100) * 1000) / 1000;
}

function presentSection(section: string | null): string | null {
  if (section === null) return null;
  const normalized = normalizeText(section);
  return normalized.length > 0 ? normalized : null;
}

/**
 * Extract every structured field from page text.
 *
 * The causa section ends where the acción section starts; the acción
 * section runs to the end of the text.
 */
export function extractStructuredFields(
  text: string,
  ocrConfidence: number,
  vocabulary: DocumentVocabulary = DEFAULT_VOCABULARY
): ExtractedFields {
  const causa = extractSection(text, vocabulary.causaHeaders, vocabulary.accionHeaders, false);
  const accion = extractSection(text, vocabulary.accionHeaders, [], false);

  return createExtractedFields({
    expediente: extractExpediente(text, undefined, vocabulary),
    causa: presentSection(causa),
    accion_solicitada: presentSection(accion),
    fechas: extractDates(text, true, true, vocabulary.months),
    montos: extractAmounts(text, vocabulary.currencies, vocabulary.amountKeywords),
    ocr_confidence: scaleConfidence(ocrConfidence),
  });
}
