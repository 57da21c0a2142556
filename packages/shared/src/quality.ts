/**
 * Quality Assessment
 *
 * Grades pages by OCR confidence and rolls a batch of results up into a
 * summary for operators.
 */

import type {
  BatchSummary,
  ProcessingResult,
  QualityAssessment,
  QualityLevel,
  QualityThresholds,
} from './types';

export const DEFAULT_QUALITY_THRESHOLDS: QualityThresholds = { high: 0.8, medium: 0.5 };

/**
 * Grade a 0..1 confidence. Only HIGH pages skip human review.
 */
export function assessQuality(
  confidence: number | null,
  thresholds: QualityThresholds = DEFAULT_QUALITY_THRESHOLDS
): QualityAssessment {
  if (confidence === null || !Number.isFinite(confidence)) {
    return { level: 'LOW', requires_review: true, confidence: null };
  }

  let level: QualityLevel = 'LOW';
  if (confidence >= thresholds.high) {
    level = 'HIGH';
  } else if (confidence >= thresholds.medium) {
    level = 'MEDIUM';
  }

  return { level, requires_review: level !== 'HIGH', confidence };
}

/**
 * Confidence of a result on a 0..1 scale, or null when OCR never completed.
 */
export function resultConfidence(result: ProcessingResult): number | null {
  if (result.ocr_result === null) return null;
  return result.ocr_result.confidence_avg / 100;
}

export function assessResult(
  result: ProcessingResult,
  thresholds: QualityThresholds = DEFAULT_QUALITY_THRESHOLDS
): QualityAssessment {
  return assessQuality(resultConfidence(result), thresholds);
}

/**
 * Summarize a batch. A unit is successful when it recorded no errors.
 */
export function summarizeResults(
  results: readonly ProcessingResult[],
  thresholds: QualityThresholds = DEFAULT_QUALITY_THRESHOLDS
): BatchSummary {
  const summary: BatchSummary = {
    total_units: results.length,
    successful: 0,
    failed: 0,
    success_rate: 0,
    quality_distribution: { HIGH: 0, MEDIUM: 0, LOW: 0 },
    review_recommendations: { auto_approve: 0, review_required: 0 },
    fields_found: { expediente: 0, causa: 0, accion_solicitada: 0 },
    sources_with_errors: [],
  };

  for (const result of results) {
    if (result.processing_errors.length === 0) {
      summary.successful++;
    } else {
      summary.failed++;
      if (!summary.sources_with_errors.includes(result.source_path)) {
        summary.sources_with_errors.push(result.source_path);
      }
    }

    const quality = assessResult(result, thresholds);
    summary.quality_distribution[quality.level]++;
    if (quality.requires_review) {
      summary.review_recommendations.review_required++;
    } else {
      summary.review_recommendations.auto_approve++;
    }

    const fields = result.extracted_fields;
    if (fields.expediente !== null) summary.fields_found.expediente++;
    if (fields.causa !== null) summary.fields_found.causa++;
    if (fields.accion_solicitada !== null) summary.fields_found.accion_solicitada++;
  }

  if (results.length > 0) {
    summary.success_rate = Math.round((summary.successful / results.length) * 10000) / 100;
  }

  return summary;
}
