/**
 * Command-line Arguments
 */

import { parseArgs } from 'node:util';
import {
  createDefaultConfig,
  describeError,
  err,
  ok,
  type ProcessingConfig,
  type ProcessingResult,
  type Result,
} from '@expedientes/shared';

export const USAGE = `Usage: expedientes --input <path> [options]

Options:
  -i, --input <path>        Image, PDF or directory to process (required)
  -o, --output <dir>        Write <name>.txt and <name>.json per page
      --no-watermark        Skip red watermark removal
      --no-deskew           Skip skew correction
      --no-binarize         Skip binarization
      --no-sections         Skip field extraction
      --no-normalize        Skip text normalization
      --lang <code>         OCR language (default: spa)
      --fallback-lang <code> OCR fallback language (default: eng)
      --concurrency <n>     Files processed at once in a directory
      --fail-on-errors      Exit with code 2 when any page recorded an error
  -h, --help                Show this help`;

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  UNIT_ERRORS: 2,
} as const;

export interface CliOptions {
  input: string;
  output?: string;
  concurrency?: number;
  failOnErrors: boolean;
  processing: ProcessingConfig;
}

export type ParsedArgs = { help: true } | { help: false; options: CliOptions };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o' },
      'no-watermark': { type: 'boolean', default: false },
      'no-deskew': { type: 'boolean', default: false },
      'no-binarize': { type: 'boolean', default: false },
      'no-sections': { type: 'boolean', default: false },
      'no-normalize': { type: 'boolean', default: false },
      lang: { type: 'string' },
      'fallback-lang': { type: 'string' },
      concurrency: { type: 'string' },
      'fail-on-errors': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

/**
 * Parse argv (without the node and script entries).
 */
export function parseCliArgs(argv: string[]): Result<ParsedArgs, UsageError> {
  let values: ReturnType<typeof readArgs>['values'];
  try {
    values = readArgs(argv).values;
  } catch (error) {
    return err(new UsageError(describeError(error)));
  }

  if (values.help === true) {
    const help: ParsedArgs = { help: true };
    return ok(help);
  }

  if (!values.input) {
    return err(new UsageError('--input is required'));
  }

  let concurrency: number | undefined;
  if (values.concurrency !== undefined) {
    concurrency = Number(values.concurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      return err(new UsageError(`--concurrency must be a positive integer, got "${values.concurrency}"`));
    }
  }

  const defaults = createDefaultConfig();
  const processing = createDefaultConfig({
    remove_watermark: values['no-watermark'] !== true,
    deskew: values['no-deskew'] !== true,
    binarize: values['no-binarize'] !== true,
    extract_sections: values['no-sections'] !== true,
    normalize_text: values['no-normalize'] !== true,
    ocr_config: {
      language: values.lang ?? defaults.ocr_config.language,
      fallback_language: values['fallback-lang'] ?? defaults.ocr_config.fallback_language,
    },
  });

  const parsed: ParsedArgs = {
    help: false,
    options: {
      input: values.input,
      output: values.output,
      concurrency,
      failOnErrors: values['fail-on-errors'] === true,
      processing,
    },
  };
  return ok(parsed);
}

/**
 * 0 unless --fail-on-errors was given and some unit recorded an error.
 */
export function exitCodeFor(results: readonly ProcessingResult[], failOnErrors: boolean): number {
  const anyErrors = results.some((result) => result.processing_errors.length > 0);
  return failOnErrors && anyErrors ? EXIT_CODES.UNIT_ERRORS : EXIT_CODES.OK;
}
