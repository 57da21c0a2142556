/**
 * Pipeline Context
 *
 * Collaborators plus the run settings every processor needs, and the default
 * ProcessingConfig.
 */

import { config } from '../config';
import type { ProcessingConfig, QualityThresholds } from '../types';
import { DEFAULT_VOCABULARY, type DocumentVocabulary } from '../vocabulary';
import type { FileLister, ImageLoader, OcrEngine, OutputWriter, Preprocessor } from './collaborators';

export interface PipelineDeps {
  loader: ImageLoader;
  lister: FileLister;
  preprocessor: Preprocessor;
  ocr: OcrEngine;
  writer: OutputWriter;
}

export interface PipelineSettings {
  /** PDF rasterization resolution */
  dpi: number;
  /** Bound on each collaborator call; 0 disables it */
  stageTimeoutMs: number;
  /** Files processed at once by the directory processor */
  concurrency: number;
  vocabulary: DocumentVocabulary;
  qualityThresholds: QualityThresholds;
}

export interface PipelineContext {
  deps: PipelineDeps;
  settings: PipelineSettings;
}

export function createPipelineContext(
  deps: PipelineDeps,
  overrides: Partial<PipelineSettings> = {}
): PipelineContext {
  return {
    deps,
    settings: {
      dpi: config.renderDpi,
      stageTimeoutMs: config.stageTimeoutMs,
      concurrency: config.batchConcurrency,
      vocabulary: DEFAULT_VOCABULARY,
      qualityThresholds: {
        high: config.qualityHighThreshold,
        medium: config.qualityMediumThreshold,
      },
      ...overrides,
    },
  };
}

/**
 * Every step enabled; OCR languages from the environment.
 */
export function createDefaultConfig(overrides: Partial<ProcessingConfig> = {}): ProcessingConfig {
  return {
    remove_watermark: true,
    deskew: true,
    binarize: true,
    extract_sections: true,
    normalize_text: true,
    ...overrides,
    ocr_config: {
      language: config.ocrLanguage,
      fallback_language: config.ocrFallbackLanguage,
      ...overrides.ocr_config,
    },
  };
}
