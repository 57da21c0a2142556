/**
 * Tesseract OCR Engine
 *
 * One tesseract.js scheduler per language, each backed by a fixed pool of
 * workers. A worker runs one job at a time; the scheduler queues the rest.
 */

import sharp from 'sharp';
import { createScheduler, createWorker, OEM, type Page, type Scheduler } from 'tesseract.js';
import {
  config,
  describeError,
  logger,
  OcrError,
  type ImageData,
  type OCRConfig,
  type OCRResult,
  type OcrEngine,
} from '@expedientes/shared';
import { summarizeConfidences } from './confidence';

export interface TesseractEngineOptions {
  /** Workers per language */
  workers: number;
  /** Directory or URL holding traineddata files */
  langPath?: string;
}

async function encodePng(image: ImageData): Promise<Buffer> {
  const { data, width, height, channels } = image.pixels;
  return sharp(data, { raw: { width, height, channels } }).png().toBuffer();
}

/**
 * Text and statistics of a recognized page. Tokens without text are ignored.
 */
export function toOcrResult(page: Pick<Page, 'text' | 'words'>, language: string): OCRResult {
  const tokens = page.words.filter((word) => word.text.trim().length > 0);
  const { confidences, average, median } = summarizeConfidences(tokens.map((word) => word.confidence));

  return {
    text: page.text,
    confidence_avg: average,
    confidence_median: median,
    confidences,
    language_used: language,
  };
}

export class TesseractOcrEngine implements OcrEngine {
  private readonly schedulers = new Map<string, Promise<Scheduler>>();
  private readonly options: TesseractEngineOptions;

  constructor(options: Partial<TesseractEngineOptions> = {}) {
    this.options = {
      workers: Math.max(1, options.workers ?? config.ocrWorkers),
      langPath: options.langPath ?? config.ocrLangPath,
    };
  }

  async recognize(image: ImageData, ocrConfig: OCRConfig): Promise<OCRResult> {
    const { language, scheduler } = await this.acquire(ocrConfig);
    const png = await encodePng(image);

    try {
      const { data } = await scheduler.addJob('recognize', png);
      return toOcrResult(data, language);
    } catch (error) {
      throw new OcrError(`Recognition failed: ${describeError(error)}`, { cause: error });
    }
  }

  async terminate(): Promise<void> {
    const pending = [...this.schedulers.values()];
    this.schedulers.clear();
    const settled = await Promise.allSettled(pending);
    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') {
        await outcome.value.terminate();
      }
    }
  }

  /**
   * Scheduler for the configured language, or for the fallback language when
   * the primary one cannot be loaded.
   */
  private async acquire(ocrConfig: OCRConfig): Promise<{ language: string; scheduler: Scheduler }> {
    try {
      return { language: ocrConfig.language, scheduler: await this.schedulerFor(ocrConfig.language) };
    } catch (error) {
      const fallback = ocrConfig.fallback_language;
      if (!fallback || fallback === ocrConfig.language) {
        throw new OcrError(`Cannot load language ${ocrConfig.language}: ${describeError(error)}`, { cause: error });
      }

      logger.warn('OCR language unavailable, using fallback', {
        language: ocrConfig.language,
        fallback,
        error: describeError(error),
      });

      try {
        return { language: fallback, scheduler: await this.schedulerFor(fallback) };
      } catch (fallbackError) {
        throw new OcrError(`Cannot load language ${fallback}: ${describeError(fallbackError)}`, {
          cause: fallbackError,
        });
      }
    }
  }

  private schedulerFor(language: string): Promise<Scheduler> {
    let scheduler = this.schedulers.get(language);
    if (!scheduler) {
      scheduler = this.createPool(language);
      this.schedulers.set(language, scheduler);
    }
    return scheduler;
  }

  private async createPool(language: string): Promise<Scheduler> {
    const scheduler = createScheduler();
    const workerOptions = this.options.langPath ? { langPath: this.options.langPath } : {};

    try {
      for (let i = 0; i < this.options.workers; i++) {
        const worker = await createWorker(language, OEM.LSTM_ONLY, workerOptions);
        scheduler.addWorker(worker);
      }
    } catch (error) {
      // Not cached, so a later call can retry
      this.schedulers.delete(language);
      await scheduler.terminate();
      throw error;
    }

    logger.info('OCR worker pool ready', { language, workers: this.options.workers });
    return scheduler;
  }
}
