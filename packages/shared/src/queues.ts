/**
 * BullMQ Queue Definitions
 *
 * Queue names, job payloads, and queue factory functions.
 */

import { Queue, Worker, Job, ConnectionOptions } from 'bullmq';
import { config } from './config';
import { logger } from './logger';
import type { ProcessingConfig } from './types';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  PROCESS_DOCUMENT: 'process_document',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * process_document - Enqueued by the API for a file or directory
 */
export interface ProcessDocumentJob {
  event_type: 'document.process';
  correlation_id: string;
  path: string;
  output_dir?: string;
  config?: Partial<ProcessingConfig>;
  requested_at: string;
}

/**
 * Value a process_document job completes with
 */
export interface ProcessDocumentJobResult {
  total_units: number;
  failed: number;
  output_paths: string[];
}

// ============================================================================
// Redis Connection
// ============================================================================

export function getRedisConnection(): ConnectionOptions {
  const redisUrl = config.redisUrl;

  if (redisUrl && redisUrl.startsWith('redis://') && URL.canParse(redisUrl)) {
    const url = new URL(redisUrl);
    return {
      host: url.hostname,
      port: parseInt(url.port || '6379', 10),
      maxRetriesPerRequest: null, // Required for BullMQ
    };
  }

  return {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };
}

// ============================================================================
// Queue Factory
// ============================================================================

const defaultJobOptions = {
  attempts: config.maxJobAttempts,
  backoff: {
    type: 'exponential' as const,
    delay: config.backoffBaseMs,
  },
  removeOnComplete: 100, // Keep last 100 completed jobs
  removeOnFail: 1000, // Keep last 1000 failed jobs
};

export function createQueue<TData, TResult>(queueName: QueueName): Queue<TData, TResult> {
  return new Queue<TData, TResult>(queueName, {
    connection: getRedisConnection(),
    defaultJobOptions,
  });
}

// ============================================================================
// Worker Factory
// ============================================================================

export interface WorkerOptions {
  concurrency?: number;
}

export function createWorker<TData, TResult>(
  queueName: QueueName,
  processor: (job: Job<TData, TResult>) => Promise<TResult>,
  options: WorkerOptions = {}
): Worker<TData, TResult> {
  const concurrency = options.concurrency || config.workerConcurrency;
  const worker = new Worker<TData, TResult>(queueName, processor, {
    connection: getRedisConnection(),
    concurrency,
  });

  worker.on('completed', (job) => {
    logger.info('Job completed', {
      queue: queueName,
      jobId: job.id,
    });
  });

  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, {
      queue: queueName,
      jobId: job?.id,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: queueName });
  });

  logger.info('Worker started', { queue: queueName, concurrency });

  return worker;
}

// ============================================================================
// Queue Metrics
// ============================================================================

export async function getQueueMetrics(queue: Queue): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}> {
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);

  return { waiting, active, completed, failed, delayed };
}

/**
 * Check backpressure thresholds
 */
export async function checkBackpressure(queue: Queue): Promise<{
  shouldWarn: boolean;
  shouldReject: boolean;
  depth: number;
}> {
  const metrics = await getQueueMetrics(queue);
  const depth = metrics.waiting + metrics.active;

  return {
    shouldWarn: depth >= config.maxQueueDepthWarning,
    shouldReject: depth >= config.maxQueueDepthReject,
    depth,
  };
}
