/**
 * OCR API
 *
 * POST /process - Runs the pipeline on a file or directory and returns the results
 * POST /jobs    - Enqueues a process_document job for the worker
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  createQueue,
  checkBackpressure,
  createPipelineContext,
  QUEUE_NAMES,
  type ProcessDocumentJob,
  type ProcessDocumentJobResult,
} from '@expedientes/shared';
import { createRuntime } from '@expedientes/runtime';
import { errorEnvelope, handleEnqueue, handleProcess, type JobQueue } from './lib/handlers';

const app = express();
const port = config.apiPort;

const runtime = createRuntime();
const pipeline = createPipelineContext(runtime.deps);

// Create the process_document queue
const processDocumentQueue = createQueue<ProcessDocumentJob, ProcessDocumentJobResult>(
  QUEUE_NAMES.PROCESS_DOCUMENT
);

const jobQueue: JobQueue = {
  checkBackpressure: () => checkBackpressure(processDocumentQueue),
  add: async (job) => {
    const added = await processDocumentQueue.add(QUEUE_NAMES.PROCESS_DOCUMENT, job);
    return added.id ?? job.correlation_id;
  },
};

function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : ulid();
}

// Middleware
app.use(express.json());

// Correlation ID middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && header.length > 0 ? header : ulid();
  res.setHeader('X-Correlation-Id', correlationId);

  runWithContext({ correlationId }, () => {
    next();
  });
});

// Request timing middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - start) / 1000;
    const route: unknown = req.route?.path;
    const path = typeof route === 'string' ? route : req.path;

    httpRequestDurationHistogram.observe(
      { method: req.method, path, status: res.statusCode.toString() },
      duration
    );
    httpRequestsCounter.inc({
      method: req.method,
      path,
      status: res.statusCode.toString(),
    });

    logger.info('Request completed', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Math.round(duration * 1000),
    });
  });

  next();
});

// Health check
app.get('/health', async (req: Request, res: Response) => {
  try {
    // Check Redis connection via queue
    const metrics = await checkBackpressure(processDocumentQueue);

    res.json({
      status: 'healthy',
      service: 'ocr-api',
      queue_depth: metrics.depth,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: 'ocr-api',
      error: error instanceof Error ? error.message : 'Unknown error',
      timestamp: new Date().toISOString(),
    });
  }
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  res.setHeader('Content-Type', getMetricsContentType());
  res.send(await getMetrics());
});

app.post('/process', async (req: Request, res: Response) => {
  const { status, body } = await handleProcess(req.body, correlationIdOf(res), pipeline);
  res.status(status).json(body);
});

app.post('/jobs', async (req: Request, res: Response) => {
  const correlationId = correlationIdOf(res);
  try {
    const { status, body } = await handleEnqueue(req.body, correlationId, jobQueue);
    res.status(status).json(body);
  } catch (error) {
    logger.error('Enqueue failed', error);
    res
      .status(500)
      .json(errorEnvelope('internal_error', error instanceof Error ? error.message : 'Unknown error', correlationId));
  }
});

// Start server
app.listen(port, () => {
  logger.info('OCR API started', { port });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await processDocumentQueue.close();
  await runtime.close();
  process.exit(0);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
