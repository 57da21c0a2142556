/**
 * Directory Processor
 *
 * Processes every supported file under a directory with bounded concurrency.
 * Results are grouped by file in listing order and, within a file, by page.
 */

import { describeError } from '../errors';
import { logger } from '../logger';
import { EMPTY_FIELDS } from '../models';
import type { ProcessingConfig, ProcessingResult } from '../types';
import { processFile } from './file-processor';
import { withLimit } from './limit';
import type { PipelineContext } from './pipeline-context';

export async function processDirectory(
  directoryPath: string,
  processingConfig: ProcessingConfig,
  outputDirectory: string | undefined,
  context: PipelineContext
): Promise<ProcessingResult[]> {
  const listed = await context.deps.lister.listSupportedFiles(directoryPath);

  if (!listed.ok) {
    const message = describeError(listed.error);
    logger.warn('Failed to list directory', { directory: directoryPath, error: message });
    return [
      {
        source_path: directoryPath,
        page_number: 1,
        ocr_result: null,
        extracted_fields: EMPTY_FIELDS,
        output_path: null,
        processing_errors: [`Failed to list directory: ${message}`],
      },
    ];
  }

  const files = listed.value;
  logger.info('Processing directory', {
    directory: directoryPath,
    files: files.length,
    concurrency: context.settings.concurrency,
  });

  const perFile = await withLimit(
    context.settings.concurrency,
    files.map((file) => () => processFile(file, processingConfig, outputDirectory, context))
  );

  return perFile.flat();
}
