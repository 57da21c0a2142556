/**
 * Record Constructors
 *
 * The only way the pipeline builds AmountData and ExtractedFields. Invalid
 * values never produce an instance: they yield null or are dropped.
 */

import { isIsoDateString } from './extractors/dates';
import type { AmountData, ExtractedFields } from './types';

export const DEFAULT_CURRENCY = 'MXN';

/**
 * @returns The amount, or null when the value is negative or not finite
 */
export function createAmountData(
  value: number,
  currency: string = DEFAULT_CURRENCY,
  originalText = ''
): AmountData | null {
  if (!Number.isFinite(value) || value < 0) return null;
  return Object.freeze({ value, currency, original_text: originalText });
}

function isAmountData(candidate: AmountData): boolean {
  return (
    Number.isFinite(candidate.value) &&
    candidate.value >= 0 &&
    typeof candidate.currency === 'string' &&
    candidate.currency.length > 0 &&
    typeof candidate.original_text === 'string'
  );
}

export interface ExtractedFieldsInput {
  expediente?: string | null;
  causa?: string | null;
  accion_solicitada?: string | null;
  fechas?: readonly string[];
  montos?: readonly AmountData[];
  ocr_confidence?: number | null;
}

/**
 * Build a frozen ExtractedFields. Dates that are not real YYYY-MM-DD days and
 * malformed amounts are silently dropped.
 */
export function createExtractedFields(input: ExtractedFieldsInput = {}): ExtractedFields {
  const confidence = input.ocr_confidence;

  return Object.freeze({
    expediente: input.expediente ?? null,
    causa: input.causa ?? null,
    accion_solicitada: input.accion_solicitada ?? null,
    fechas: Object.freeze((input.fechas ?? []).filter(isIsoDateString)),
    montos: Object.freeze((input.montos ?? []).filter(isAmountData)),
    ocr_confidence: typeof confidence === 'number' && Number.isFinite(confidence) ? confidence : null,
  });
}

export const EMPTY_FIELDS: ExtractedFields = createExtractedFields();
