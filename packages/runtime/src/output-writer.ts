/**
 * Output Writer
 *
 * Writes `<stem>.txt` (OCR text) and `<stem>.json` (the page result) for each
 * page. Pages of multi-page sources get a `_p<N>` suffix.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {
  describeError,
  logger,
  validateProcessingResult,
  WriteError,
  type OutputWriter,
  type ProcessingResult,
  type QualityAssessment,
  type WriteOptions,
} from '@expedientes/shared';

/**
 * JSON document written for one page
 */
export interface PageDocument {
  source_path: string;
  page_number: number;
  total_pages: number;
  ocr_result: ProcessingResult['ocr_result'];
  extracted_fields: ProcessingResult['extracted_fields'];
  processing_errors: string[];
  quality?: QualityAssessment;
  generated_at: string;
}

export function outputStem(result: ProcessingResult, totalPages: number): string {
  const stem = path.parse(result.source_path).name;
  return totalPages > 1 ? `${stem}_p${result.page_number}` : stem;
}

export function toPageDocument(result: ProcessingResult, options: WriteOptions, now: Date = new Date()): PageDocument {
  return {
    source_path: result.source_path,
    page_number: result.page_number,
    total_pages: Math.max(1, options.totalPages),
    ocr_result: result.ocr_result,
    extracted_fields: result.extracted_fields,
    processing_errors: [...result.processing_errors],
    ...(options.quality ? { quality: options.quality } : {}),
    generated_at: now.toISOString(),
  };
}

export class FsOutputWriter implements OutputWriter {
  async write(result: ProcessingResult, outputDirectory: string, options: WriteOptions): Promise<string> {
    const document = toPageDocument(result, options);
    const validation = validateProcessingResult(document);
    if (!validation.valid) {
      throw new WriteError(`Output failed schema validation: ${(validation.errors ?? []).join('; ')}`);
    }

    const base = path.join(outputDirectory, outputStem(result, options.totalPages));
    const jsonPath = `${base}.json`;

    try {
      await fs.mkdir(outputDirectory, { recursive: true });
      await fs.writeFile(`${base}.txt`, result.ocr_result?.text ?? '', 'utf-8');
      await fs.writeFile(jsonPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new WriteError(`Cannot write ${jsonPath}: ${describeError(error)}`, { cause: error });
    }

    logger.debug('Output written', { path: jsonPath });
    return jsonPath;
  }
}
