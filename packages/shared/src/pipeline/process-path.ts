/**
 * Path Dispatch
 */

import { PathNotFoundError } from '../errors';
import { logger } from '../logger';
import type { ProcessingConfig, ProcessingResult } from '../types';
import { processDirectory } from './directory-processor';
import { processFile } from './file-processor';
import { createDefaultConfig, type PipelineContext } from './pipeline-context';

/**
 * Process a file or a directory.
 *
 * @throws PathNotFoundError when the path is neither
 */
export async function processPath(
  inputPath: string,
  context: PipelineContext,
  processingConfig: ProcessingConfig = createDefaultConfig(),
  outputDirectory?: string
): Promise<ProcessingResult[]> {
  const kind = await context.deps.lister.inspectPath(inputPath);

  switch (kind) {
    case 'file':
      return processFile(inputPath, processingConfig, outputDirectory, context);
    case 'directory':
      return processDirectory(inputPath, processingConfig, outputDirectory, context);
    case 'missing':
      logger.warn('Input path does not exist', { path: inputPath });
      throw new PathNotFoundError(inputPath);
  }
}
