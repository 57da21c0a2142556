/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // OCR
  ocrLanguage: string;
  ocrFallbackLanguage: string;
  ocrLangPath: string | undefined;
  ocrWorkers: number;

  // Pipeline
  renderDpi: number;
  stageTimeoutMs: number;
  batchConcurrency: number;
  supportedExtensions: string[];
  defaultOutputDir: string | undefined;

  // Quality thresholds (0..1 OCR confidence)
  qualityHighThreshold: number;
  qualityMediumThreshold: number;

  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // Backpressure Controls
  maxQueueDepthWarning: number;
  maxQueueDepthReject: number;

  // Ports
  apiPort: number;
  metricsPort: number;
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0)
    .map((item) => (item.startsWith('.') ? item : `.${item}`));
}

export const config: Config = {
  // OCR
  ocrLanguage: process.env.OCR_LANGUAGE || 'spa',
  ocrFallbackLanguage: process.env.OCR_FALLBACK_LANGUAGE || 'eng',
  ocrLangPath: process.env.OCR_LANG_PATH || undefined,
  ocrWorkers: parseInt(process.env.OCR_WORKERS || '2', 10),

  // Pipeline
  renderDpi: parseInt(process.env.RENDER_DPI || '300', 10),
  stageTimeoutMs: parseInt(process.env.STAGE_TIMEOUT_MS || '120000', 10),
  batchConcurrency: parseInt(process.env.BATCH_CONCURRENCY || '2', 10),
  supportedExtensions: parseList(process.env.SUPPORTED_EXTENSIONS, [
    '.png',
    '.jpg',
    '.jpeg',
    '.tif',
    '.tiff',
    '.webp',
    '.pdf',
  ]),
  defaultOutputDir: process.env.OUTPUT_DIR || undefined,

  // Quality thresholds
  qualityHighThreshold: parseFloat(process.env.QUALITY_HIGH_THRESHOLD || '0.80'),
  qualityMediumThreshold: parseFloat(process.env.QUALITY_MEDIUM_THRESHOLD || '0.50'),

  // Redis
  redisHost: process.env.REDIS_HOST || 'localhost',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '2', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // Backpressure Controls
  maxQueueDepthWarning: parseInt(process.env.MAX_QUEUE_DEPTH_WARNING || '500', 10),
  maxQueueDepthReject: parseInt(process.env.MAX_QUEUE_DEPTH_REJECT || '1000', 10),

  // Ports
  apiPort: parseInt(process.env.PORT || '8080', 10),
  metricsPort: parseInt(process.env.METRICS_PORT || '9464', 10),
};
