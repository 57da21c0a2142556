/**
 * Runtime Package - Default Collaborators
 */

import { config, type PipelineDeps } from '@expedientes/shared';
import { FsFileLister } from './file-lister';
import { SharpImageLoader } from './image-loader';
import { FsOutputWriter } from './output-writer';
import { SharpPreprocessor } from './preprocessor';
import { TesseractOcrEngine, type TesseractEngineOptions } from './tesseract-ocr';

export { FsFileLister } from './file-lister';
export { SharpImageLoader } from './image-loader';
export { SharpPreprocessor } from './preprocessor';
export { TesseractOcrEngine, toOcrResult, type TesseractEngineOptions } from './tesseract-ocr';
export { FsOutputWriter, outputStem, toPageDocument, type PageDocument } from './output-writer';
export { summarizeConfidences, type ConfidenceSummary } from './confidence';
export * from './pixels';

export interface Runtime {
  deps: PipelineDeps;
  /** Stops the OCR workers */
  close: () => Promise<void>;
}

export interface RuntimeOptions {
  extensions?: readonly string[];
  ocr?: Partial<TesseractEngineOptions>;
}

/**
 * Collaborators backed by the file system, sharp and tesseract.js.
 */
export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const extensions = options.extensions ?? config.supportedExtensions;
  const ocr = new TesseractOcrEngine(options.ocr);

  return {
    deps: {
      lister: new FsFileLister(extensions),
      loader: new SharpImageLoader(extensions),
      preprocessor: new SharpPreprocessor(),
      ocr,
      writer: new FsOutputWriter(),
    },
    close: () => ocr.terminate(),
  };
}
