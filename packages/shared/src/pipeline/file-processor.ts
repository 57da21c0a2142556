/**
 * File Processor
 *
 * Loads every page of one source file, processes the pages in order and
 * optionally writes each result. Always returns at least one result.
 */

import { withUnitContext } from '../context';
import { describeError, err, LoadError, PipelineError, withTimeout, type Result } from '../errors';
import { logger } from '../logger';
import { filesProcessedCounter } from '../metrics';
import { EMPTY_FIELDS } from '../models';
import { assessResult } from '../quality';
import type { ImageData, ProcessingConfig, ProcessingResult } from '../types';
import { processSingleImage } from './page-processor';
import type { PipelineContext } from './pipeline-context';

async function loadPages(filePath: string, context: PipelineContext): Promise<Result<ImageData[], PipelineError>> {
  const { deps, settings } = context;
  try {
    return await withTimeout(
      deps.loader.load(filePath, { dpi: settings.dpi }),
      settings.stageTimeoutMs,
      'LOAD',
      'Loading'
    );
  } catch (error) {
    return err(error instanceof PipelineError ? error : new LoadError(describeError(error), { cause: error }));
  }
}

function loadFailure(filePath: string, message: string): ProcessingResult {
  return {
    source_path: filePath,
    page_number: 1,
    ocr_result: null,
    extracted_fields: EMPTY_FIELDS,
    output_path: null,
    processing_errors: [`Failed to load file: ${message}`],
  };
}

async function writeResult(
  result: ProcessingResult,
  image: ImageData,
  outputDirectory: string,
  context: PipelineContext
): Promise<void> {
  const { deps, settings } = context;
  try {
    result.output_path = await withTimeout(
      deps.writer.write(result, outputDirectory, {
        totalPages: image.total_pages,
        quality: assessResult(result, settings.qualityThresholds),
      }),
      settings.stageTimeoutMs,
      'WRITE',
      'Writing output'
    );
  } catch (error) {
    logger.warn('Failed to write output', { error: describeError(error), pageNumber: image.page_number });
    result.processing_errors.push(`Failed to write output: ${describeError(error)}`);
  }
}

/**
 * Process every page of a file.
 *
 * An unloadable file, or one with no pages, yields a single page-1 result
 * carrying the load error. Pages with errors are still written.
 */
export async function processFile(
  filePath: string,
  processingConfig: ProcessingConfig,
  outputDirectory: string | undefined,
  context: PipelineContext
): Promise<ProcessingResult[]> {
  return withUnitContext({ sourcePath: filePath }, async () => {
    const loaded = await loadPages(filePath, context);

    if (!loaded.ok || loaded.value.length === 0) {
      const message = loaded.ok ? 'no pages found' : describeError(loaded.error);
      logger.warn('Failed to load file', { error: message });
      filesProcessedCounter.inc({ status: 'load_failed' });
      return [loadFailure(filePath, message)];
    }

    const pages = loaded.value;
    logger.info('File loaded', { pages: pages.length });

    const results: ProcessingResult[] = [];
    for (const image of pages) {
      const result = await processSingleImage(image, processingConfig, context);
      if (outputDirectory) {
        await writeResult(result, image, outputDirectory, context);
      }
      results.push(result);
    }

    const failed = results.some((result) => result.processing_errors.length > 0);
    filesProcessedCounter.inc({ status: failed ? 'partial' : 'success' });

    return results;
  });
}
