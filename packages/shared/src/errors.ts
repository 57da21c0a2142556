/**
 * Pipeline Errors
 *
 * Typed errors for each stage, a Result type for collaborator boundaries,
 * and helpers that turn rejections and timeouts into values.
 */

export type PipelineStage =
  | 'LOAD'
  | 'LIST'
  | 'PREPROCESS'
  | 'OCR'
  | 'NORMALIZE'
  | 'EXTRACT'
  | 'WRITE'
  | 'DISPATCH';

export class PipelineError extends Error {
  readonly code: string;
  readonly stage: PipelineStage;

  constructor(code: string, stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.stage = stage;
  }
}

export class LoadError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('load_failed', 'LOAD', message, options);
  }
}

export class ListError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('list_failed', 'LIST', message, options);
  }
}

export class PreprocessingError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('preprocessing_failed', 'PREPROCESS', message, options);
  }
}

export class OcrError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ocr_failed', 'OCR', message, options);
  }
}

/**
 * Extractors are total over their input; this only wraps an unexpected
 * failure inside the aggregation step.
 */
export class ExtractionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('extraction_failed', 'EXTRACT', message, options);
  }
}

export class WriteError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('write_failed', 'WRITE', message, options);
  }
}

export class StageTimeoutError extends PipelineError {
  readonly timeoutMs: number;

  constructor(stage: PipelineStage, label: string, timeoutMs: number) {
    super('stage_timeout', stage, `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class PathNotFoundError extends PipelineError {
  readonly path: string;

  constructor(path: string) {
    super('path_not_found', 'DISPATCH', `Path does not exist: ${path}`);
    this.path = path;
  }
}

// ============================================================================
// Result
// ============================================================================

export type Result<T, E extends Error = PipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Message of any thrown value. Values without a usable `toString` (such as
 * `Object.create(null)`) get their object tag.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  try {
    return String(error);
  } catch {
    return Object.prototype.toString.call(error);
  }
}

/**
 * Await an operation and capture a rejection as a Result. Errors that are
 * not already of the expected kind are wrapped by `wrap`.
 */
export async function attempt<T, E extends PipelineError>(
  operation: () => Promise<T>,
  wrap: (error: unknown) => E
): Promise<Result<T, E | StageTimeoutError>> {
  try {
    return ok(await operation());
  } catch (error) {
    if (error instanceof StageTimeoutError) return err(error);
    return err(wrap(error));
  }
}

/**
 * Bound a collaborator call. A non-positive timeout disables the bound.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  stage: PipelineStage,
  label: string
): Promise<T> {
  if (!(timeoutMs > 0)) return operation;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StageTimeoutError(stage, label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
