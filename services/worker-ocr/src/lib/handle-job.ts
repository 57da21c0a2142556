/**
 * process_document Job Handler
 *
 * Runs the pipeline for one job inside the job's correlation context. Per-unit
 * errors are part of a completed job; only a missing input path fails it.
 */

import { UnrecoverableError } from 'bullmq';
import {
  config,
  createDefaultConfig,
  jobDurationHistogram,
  jobsProcessedCounter,
  logger,
  PathNotFoundError,
  processPath,
  QUEUE_NAMES,
  runWithContextAsync,
  summarizeResults,
  type PipelineContext,
  type ProcessDocumentJob,
  type ProcessDocumentJobResult,
} from '@expedientes/shared';

export interface JobInfo {
  id?: string;
  attempt: number;
}

export async function handleProcessDocument(
  data: ProcessDocumentJob,
  job: JobInfo,
  context: PipelineContext
): Promise<ProcessDocumentJobResult> {
  return runWithContextAsync({ correlationId: data.correlation_id }, async () => {
    const startTime = Date.now();
    const queue = QUEUE_NAMES.PROCESS_DOCUMENT;

    logger.info('Processing process_document', {
      jobId: job.id,
      path: data.path,
      attempt: job.attempt,
    });

    try {
      const results = await processPath(
        data.path,
        context,
        createDefaultConfig(data.config),
        data.output_dir ?? config.defaultOutputDir
      );
      const summary = summarizeResults(results, context.settings.qualityThresholds);

      const duration = (Date.now() - startTime) / 1000;
      jobsProcessedCounter.inc({ queue, status: 'success' });
      jobDurationHistogram.observe({ queue, status: 'success' }, duration);

      logger.info('Processed process_document', {
        jobId: job.id,
        total_units: summary.total_units,
        failed: summary.failed,
        success_rate: summary.success_rate,
      });

      return {
        total_units: summary.total_units,
        failed: summary.failed,
        output_paths: results.flatMap((result) => (result.output_path ? [result.output_path] : [])),
      };
    } catch (error) {
      jobsProcessedCounter.inc({ queue, status: 'failed' });
      jobDurationHistogram.observe({ queue, status: 'failed' }, (Date.now() - startTime) / 1000);

      if (error instanceof PathNotFoundError) {
        // Retrying cannot make the path appear
        throw new UnrecoverableError(error.message);
      }
      throw error;
    }
  });
}
