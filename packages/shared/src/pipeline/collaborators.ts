/**
 * Pipeline Collaborators
 *
 * The I/O-bound steps the orchestrator drives but does not implement. The
 * runtime package provides the default implementations; tests use fakes.
 */

import type { ListError, LoadError, Result } from '../errors';
import type {
  ImageData,
  OCRConfig,
  OCRResult,
  PreprocessOptions,
  ProcessingResult,
  QualityAssessment,
} from '../types';

export type PathKind = 'file' | 'directory' | 'missing';

export interface FileLister {
  inspectPath(path: string): Promise<PathKind>;
  /** Supported files under a directory, recursively, sorted by path */
  listSupportedFiles(directory: string): Promise<Result<string[], ListError>>;
}

export interface LoadOptions {
  /** Rasterization resolution for PDF pages */
  dpi: number;
}

export interface ImageLoader {
  /** One ImageData per page, numbered from 1 */
  load(path: string, options: LoadOptions): Promise<Result<ImageData[], LoadError>>;
}

export interface Preprocessor {
  /** Returns a new image; the input is left untouched */
  preprocess(image: ImageData, options: PreprocessOptions): Promise<ImageData>;
}

export interface OcrEngine {
  recognize(image: ImageData, config: OCRConfig): Promise<OCRResult>;
}

export interface WriteOptions {
  /** Page count of the source; pages of multi-page sources get a _pN suffix */
  totalPages: number;
  /** Embedded in the JSON output when given */
  quality?: QualityAssessment;
}

export interface OutputWriter {
  /**
   * Persist a result and return the path of the written JSON document.
   * Rejects with a WriteError.
   */
  write(result: ProcessingResult, outputDirectory: string, options: WriteOptions): Promise<string>;
}
