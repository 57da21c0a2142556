/**
 * Shared TypeScript Types
 *
 * Data contracts for the OCR extraction pipeline. Field names match the JSON
 * written by the output writer and the schemas in docs/contracts/.
 */

// ============================================================================
// Images & OCR
// ============================================================================

/**
 * Raw interleaved pixels. Owned by the loader; treated as opaque by the core.
 */
export interface PixelBuffer {
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
  readonly channels: 1 | 2 | 3 | 4;
}

/**
 * One page of a source file. Preprocessing produces a new instance.
 */
export interface ImageData {
  readonly pixels: PixelBuffer;
  readonly source_path: string;
  readonly page_number: number;
  readonly total_pages: number;
}

export interface OCRConfig {
  language: string;
  fallback_language: string;
}

export interface OCRResult {
  text: string;
  confidence_avg: number;
  confidence_median: number;
  /** Per-token confidences, each in [0, 100] */
  confidences: number[];
  language_used: string;
}

// ============================================================================
// Extracted Fields
// ============================================================================

export interface AmountData {
  /** Always >= 0 */
  readonly value: number;
  readonly currency: string;
  /** Raw matched substring */
  readonly original_text: string;
}

export interface ExtractedFields {
  readonly expediente: string | null;
  readonly causa: string | null;
  readonly accion_solicitada: string | null;
  /** Canonical YYYY-MM-DD dates */
  readonly fechas: readonly string[];
  readonly montos: readonly AmountData[];
  /** Page OCR confidence on a 0..1 scale, when OCR ran */
  readonly ocr_confidence: number | null;
}

// ============================================================================
// Processing
// ============================================================================

export interface ProcessingConfig {
  remove_watermark: boolean;
  deskew: boolean;
  binarize: boolean;
  ocr_config: OCRConfig;
  extract_sections: boolean;
  normalize_text: boolean;
}

export type PreprocessOptions = Pick<ProcessingConfig, 'remove_watermark' | 'deskew' | 'binarize'>;

/**
 * Terminal unit of work. Once created it is only appended to:
 * `processing_errors` grows and `output_path` is set after a successful write.
 */
export interface ProcessingResult {
  readonly source_path: string;
  readonly page_number: number;
  readonly ocr_result: OCRResult | null;
  readonly extracted_fields: ExtractedFields;
  output_path: string | null;
  readonly processing_errors: string[];
}

// ============================================================================
// Quality & Summary
// ============================================================================

export type QualityLevel = 'HIGH' | 'MEDIUM' | 'LOW';

export interface QualityThresholds {
  high: number;
  medium: number;
}

export interface QualityAssessment {
  level: QualityLevel;
  requires_review: boolean;
  /** 0..1, null when no OCR result exists */
  confidence: number | null;
}

export interface BatchSummary {
  total_units: number;
  successful: number;
  failed: number;
  success_rate: number;
  quality_distribution: Record<QualityLevel, number>;
  review_recommendations: {
    auto_approve: number;
    review_required: number;
  };
  fields_found: {
    expediente: number;
    causa: number;
    accion_solicitada: number;
  };
  sources_with_errors: string[];
}

// ============================================================================
// API Types
// ============================================================================

export interface ProcessRequest {
  path: string;
  output_dir?: string;
  config?: Partial<ProcessingConfig>;
}

export interface ProcessResponse {
  correlation_id: string;
  summary: BatchSummary;
  results: ProcessingResult[];
}

export interface EnqueueResponse {
  correlation_id: string;
  job_id: string;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
