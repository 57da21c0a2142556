/**
 * Request Handlers
 *
 * Framework-free handlers for the OCR API routes. Each returns the status
 * and body to send.
 */

import {
  backpressureRejectionsCounter,
  config,
  createDefaultConfig,
  describeError,
  logger,
  PathNotFoundError,
  processPath,
  summarizeResults,
  validateProcessRequest,
  type EnqueueResponse,
  type ErrorEnvelope,
  type PipelineContext,
  type ProcessDocumentJob,
  type ProcessRequest,
  type ProcessResponse,
} from '@expedientes/shared';

export interface HandlerResponse<T> {
  status: number;
  body: T | ErrorEnvelope;
}

/**
 * Queue operations the enqueue route needs
 */
export interface JobQueue {
  checkBackpressure(): Promise<{ shouldWarn: boolean; shouldReject: boolean; depth: number }>;
  /** Resolves to the job id */
  add(job: ProcessDocumentJob): Promise<string>;
}

export function errorEnvelope(code: string, message: string, correlationId: string): ErrorEnvelope {
  return { error: { code, message, correlation_id: correlationId } };
}

function isProcessRequest(body: unknown): body is ProcessRequest {
  return validateProcessRequest(body).valid;
}

function invalidRequest(body: unknown, correlationId: string): HandlerResponse<never> {
  const { errors } = validateProcessRequest(body);
  return {
    status: 400,
    body: errorEnvelope('invalid_request', (errors ?? ['invalid body']).join('; '), correlationId),
  };
}

/**
 * POST /process - run the pipeline synchronously
 */
export async function handleProcess(
  body: unknown,
  correlationId: string,
  context: PipelineContext
): Promise<HandlerResponse<ProcessResponse>> {
  if (!isProcessRequest(body)) {
    return invalidRequest(body, correlationId);
  }

  try {
    const results = await processPath(
      body.path,
      context,
      createDefaultConfig(body.config),
      body.output_dir ?? config.defaultOutputDir
    );

    return {
      status: 200,
      body: {
        correlation_id: correlationId,
        summary: summarizeResults(results, context.settings.qualityThresholds),
        results,
      },
    };
  } catch (error) {
    if (error instanceof PathNotFoundError) {
      return { status: 404, body: errorEnvelope('not_found', error.message, correlationId) };
    }

    logger.error('Processing failed', error);
    return { status: 500, body: errorEnvelope('internal_error', describeError(error), correlationId) };
  }
}

/**
 * POST /jobs - enqueue a process_document job
 */
export async function handleEnqueue(
  body: unknown,
  correlationId: string,
  queue: JobQueue,
  now: () => Date = () => new Date()
): Promise<HandlerResponse<EnqueueResponse>> {
  if (!isProcessRequest(body)) {
    return invalidRequest(body, correlationId);
  }

  const backpressure = await queue.checkBackpressure();

  if (backpressure.shouldReject) {
    backpressureRejectionsCounter.inc();
    logger.warn('Request rejected due to backpressure', {
      queue_depth: backpressure.depth,
    });

    return {
      status: 503,
      body: errorEnvelope('service_unavailable', 'System is under heavy load. Please retry later.', correlationId),
    };
  }

  if (backpressure.shouldWarn) {
    logger.warn('Queue depth approaching threshold', {
      queue_depth: backpressure.depth,
    });
  }

  const job: ProcessDocumentJob = {
    event_type: 'document.process',
    correlation_id: correlationId,
    path: body.path,
    requested_at: now().toISOString(),
    ...(body.output_dir ? { output_dir: body.output_dir } : {}),
    ...(body.config ? { config: body.config } : {}),
  };

  const jobId = await queue.add(job);
  logger.info('Enqueued process_document job', { jobId, path: body.path });

  return { status: 202, body: { correlation_id: correlationId, job_id: jobId } };
}
