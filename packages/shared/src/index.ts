/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  withUnitContext,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  PipelineError,
  LoadError,
  ListError,
  PreprocessingError,
  OcrError,
  ExtractionError,
  WriteError,
  StageTimeoutError,
  PathNotFoundError,
  ok,
  err,
  attempt,
  withTimeout,
  describeError,
  type PipelineStage,
  type Result,
} from './errors';

// Text
export { normalizeForMatching, normalizeText } from './text/normalize';

// Vocabulary
export {
  DEFAULT_VOCABULARY,
  createVocabulary,
  type CurrencyMarker,
  type DocumentVocabulary,
} from './vocabulary';

// Records
export {
  createAmountData,
  createExtractedFields,
  EMPTY_FIELDS,
  DEFAULT_CURRENCY,
  type ExtractedFieldsInput,
} from './models';

// Extractors
export * from './extractors';

// Quality
export {
  assessQuality,
  assessResult,
  resultConfidence,
  summarizeResults,
  DEFAULT_QUALITY_THRESHOLDS,
} from './quality';

// Pipeline
export * from './pipeline';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ProcessDocumentJob,
  type ProcessDocumentJobResult,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  pagesProcessedCounter,
  pageDurationHistogram,
  filesProcessedCounter,
  ocrConfidenceHistogram,
  stageFailuresCounter,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  reportQueueMetrics,
  serveMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateProcessingResult,
  validateProcessRequest,
  schemas,
  SCHEMA_FILES,
  type ValidationResult,
} from './schemas';
