/**
 * OCR Worker
 *
 * Consumes the process_document queue and runs the extraction pipeline on
 * the requested file or directory.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  createWorker,
  createQueue,
  createPipelineContext,
  reportQueueMetrics,
  serveMetrics,
  QUEUE_NAMES,
  type ProcessDocumentJob,
  type ProcessDocumentJobResult,
} from '@expedientes/shared';
import { createRuntime } from '@expedientes/runtime';
import { handleProcessDocument } from './lib/handle-job';

const runtime = createRuntime();
const pipeline = createPipelineContext(runtime.deps);

// Queue handle for depth gauges only
const processDocumentQueue = createQueue<ProcessDocumentJob, ProcessDocumentJobResult>(
  QUEUE_NAMES.PROCESS_DOCUMENT
);

async function processDocument(
  job: Job<ProcessDocumentJob, ProcessDocumentJobResult>
): Promise<ProcessDocumentJobResult> {
  return handleProcessDocument(job.data, { id: job.id, attempt: job.attemptsMade + 1 }, pipeline);
}

// Expose /metrics for Prometheus
const metricsServer = serveMetrics(config.metricsPort, () =>
  reportQueueMetrics([{ name: QUEUE_NAMES.PROCESS_DOCUMENT, queue: processDocumentQueue }])
);

// Create and start the worker
const worker = createWorker<ProcessDocumentJob, ProcessDocumentJobResult>(
  QUEUE_NAMES.PROCESS_DOCUMENT,
  processDocument
);

logger.info('OCR worker started');

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await processDocumentQueue.close();
  await runtime.close();
  metricsServer.close();
  process.exit(0);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
