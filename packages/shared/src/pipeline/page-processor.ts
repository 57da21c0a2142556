/**
 * Page Processor
 *
 * Drives one page through preprocessing, OCR, text normalization and field
 * extraction. Never rejects: a failure at any stage is recorded in
 * `processing_errors` and the result built so far is returned.
 */

import { withUnitContext } from '../context';
import { describeError, ExtractionError, PipelineError, withTimeout, type PipelineStage } from '../errors';
import { extractStructuredFields } from '../extractors/fields';
import { logger } from '../logger';
import {
  ocrConfidenceHistogram,
  pageDurationHistogram,
  pagesProcessedCounter,
  stageFailuresCounter,
} from '../metrics';
import { EMPTY_FIELDS } from '../models';
import { normalizeText } from '../text/normalize';
import type { ExtractedFields, ImageData, OCRResult, ProcessingConfig, ProcessingResult } from '../types';
import type { PipelineContext } from './pipeline-context';
import { pageStateMachine, type PageState } from './state-machine';

type PageStage = Extract<PipelineStage, 'PREPROCESS' | 'OCR' | 'NORMALIZE' | 'EXTRACT'>;

/** Name used in "<Stage> failed: <cause>" messages */
export const STAGE_LABELS: Record<PageStage, string> = {
  PREPROCESS: 'Preprocessing',
  OCR: 'OCR',
  NORMALIZE: 'Normalization',
  EXTRACT: 'Field extraction',
};

class PageRun {
  state: PageState = 'LOADED';
  stage: PageStage = 'PREPROCESS';

  advance(to: PageState): void {
    pageStateMachine.assertTransition(this.state, to);
    this.state = to;
  }

  async step<T>(stage: PageStage, next: PageState, run: () => T | Promise<T>): Promise<T> {
    this.stage = stage;
    const started = Date.now();
    logger.debug(`${STAGE_LABELS[stage]} started`);
    const value = await run();
    this.advance(next);
    logger.debug(`${STAGE_LABELS[stage]} finished`, { durationMs: Date.now() - started });
    return value;
  }

  fail(): void {
    if (!pageStateMachine.isTerminal(this.state)) {
      this.advance('FAILED');
    }
  }
}

/**
 * Process one page image.
 */
export async function processSingleImage(
  image: ImageData,
  processingConfig: ProcessingConfig,
  context: PipelineContext
): Promise<ProcessingResult> {
  return withUnitContext({ sourcePath: image.source_path, pageNumber: image.page_number }, async () => {
    const { deps, settings } = context;
    const timeoutMs = settings.stageTimeoutMs;
    const run = new PageRun();
    const errors: string[] = [];
    const started = Date.now();

    let ocrResult: OCRResult | null = null;
    let fields: ExtractedFields = EMPTY_FIELDS;

    try {
      const preprocessed = await run.step('PREPROCESS', 'PREPROCESSED', () =>
        withTimeout(
          deps.preprocessor.preprocess(image, {
            remove_watermark: processingConfig.remove_watermark,
            deskew: processingConfig.deskew,
            binarize: processingConfig.binarize,
          }),
          timeoutMs,
          'PREPROCESS',
          STAGE_LABELS.PREPROCESS
        )
      );

      const recognized = await run.step('OCR', 'OCR_DONE', () =>
        withTimeout(deps.ocr.recognize(preprocessed, processingConfig.ocr_config), timeoutMs, 'OCR', STAGE_LABELS.OCR)
      );
      ocrResult = recognized;
      ocrConfidenceHistogram.observe(recognized.confidence_avg);

      const text = await run.step('NORMALIZE', 'NORMALIZED', () =>
        processingConfig.normalize_text ? normalizeText(recognized.text) : recognized.text
      );

      fields = await run.step('EXTRACT', 'FIELDS_EXTRACTED', () => {
        if (!processingConfig.extract_sections) return EMPTY_FIELDS;
        try {
          return extractStructuredFields(text, recognized.confidence_avg, settings.vocabulary);
        } catch (error) {
          throw new ExtractionError(describeError(error), { cause: error });
        }
      });

      run.advance('RESULT_READY');
    } catch (error) {
      const stage = run.stage;
      run.fail();
      stageFailuresCounter.inc({ stage });
      logger.warn(`${STAGE_LABELS[stage]} failed`, {
        stage,
        code: error instanceof PipelineError ? error.code : undefined,
        error: describeError(error),
      });
      errors.push(`${STAGE_LABELS[stage]} failed: ${describeError(error)}`);
    }

    const status = errors.length === 0 ? 'success' : 'failed';
    pagesProcessedCounter.inc({ status });
    pageDurationHistogram.observe((Date.now() - started) / 1000);
    logger.info('Page processed', {
      status,
      confidence: ocrResult?.confidence_avg,
      expediente: fields.expediente,
    });

    return {
      source_path: image.source_path,
      page_number: image.page_number,
      ocr_result: ocrResult,
      extracted_fields: fields,
      output_path: null,
      processing_errors: errors,
    };
  });
}
