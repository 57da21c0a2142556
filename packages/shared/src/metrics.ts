/**
 * Prometheus Metrics
 *
 * Metrics for page and file processing, queue depth, jobs and HTTP traffic.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { describeError } from './errors';
import { logger } from './logger';
import { getQueueMetrics } from './queues';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: describeError(err),
  });
}

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const pagesProcessedCounter = new promClient.Counter({
  name: 'expedientes_pages_processed_total',
  help: 'Total number of pages processed',
  labelNames: ['status'],
  registers: [register],
});

export const pageDurationHistogram = new promClient.Histogram({
  name: 'expedientes_page_duration_seconds',
  help: 'Duration of processing one page (preprocessing through field extraction)',
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

export const filesProcessedCounter = new promClient.Counter({
  name: 'expedientes_files_processed_total',
  help: 'Total number of source files processed',
  labelNames: ['status'],
  registers: [register],
});

export const ocrConfidenceHistogram = new promClient.Histogram({
  name: 'expedientes_ocr_confidence',
  help: 'Average OCR confidence per page (0-100)',
  buckets: [10, 20, 30, 40, 50, 60, 70, 80, 90, 100],
  registers: [register],
});

export const stageFailuresCounter = new promClient.Counter({
  name: 'expedientes_stage_failures_total',
  help: 'Soft failures recorded per pipeline stage',
  labelNames: ['stage'],
  registers: [register],
});

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'expedientes_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const queueMetricsGauge = new promClient.Gauge({
  name: 'expedientes_queue_metrics',
  help: 'Queue metrics by state',
  labelNames: ['queue', 'state'],
  registers: [register],
});

// ============================================================================
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'expedientes_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [1, 5, 10, 30, 60, 120, 300, 600],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'expedientes_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

export const backpressureRejectionsCounter = new promClient.Counter({
  name: 'expedientes_backpressure_rejections_total',
  help: 'Total number of requests rejected due to backpressure',
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'expedientes_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30, 120],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'expedientes_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Report queue depths and state metrics to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(
  queues: Array<{ name: string; queue: Queue }>
): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      queueDepthGauge.set({ queue: name }, m.waiting + m.active);
      queueMetricsGauge.set({ queue: name, state: 'waiting' }, m.waiting);
      queueMetricsGauge.set({ queue: name, state: 'active' }, m.active);
      queueMetricsGauge.set({ queue: name, state: 'completed' }, m.completed);
      queueMetricsGauge.set({ queue: name, state: 'failed' }, m.failed);
      queueMetricsGauge.set({ queue: name, state: 'delayed' }, m.delayed);
    } catch (err) {
      logger.warn('Queue metrics unavailable', { queue: name, error: describeError(err) });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 */
export function serveMetrics(port: number, beforeScrape?: () => Promise<void>): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url !== '/metrics' || req.method !== 'GET') {
      res.statusCode = 404;
      res.end();
      return;
    }

    (beforeScrape ? beforeScrape() : Promise.resolve())
      .then(() => getMetrics())
      .then((body) => {
        res.setHeader('Content-Type', getMetricsContentType());
        res.end(body);
      })
      .catch((err: unknown) => {
        logger.error('Metrics scrape failed', err);
        res.statusCode = 500;
        res.end();
      });
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
