/**
 * Pipeline Orchestration Tests
 *
 * Page, file, directory and path processing against in-process collaborators.
 */

import {
  createDefaultConfig,
  DEFAULT_VOCABULARY,
  EMPTY_FIELDS,
  PathNotFoundError,
  processDirectory,
  processFile,
  processPath,
  processSingleImage,
  type DocumentVocabulary,
  type ImageData,
  type ImageLoader,
  type OCRConfig,
  type OCRResult,
  type OcrEngine,
} from '@expedientes/shared';
import {
  fakeContext,
  FakeLister,
  FakeLoader,
  FakeOcr,
  FakePreprocessor,
  FakeWriter,
  makeImage,
  makeOcrResult,
} from './fakes';

const ORDER_TEXT = 'No. Expediente EXP-2024-001, Juzgado Primero. ACCIÓN SOLICITADA: CONGELAR CUENTAS';

describe('processSingleImage', () => {
  it('runs every stage and extracts fields', async () => {
    const context = fakeContext({ ocr: new FakeOcr({ 'doc.png#1': ORDER_TEXT }) });

    const result = await processSingleImage(makeImage('doc.png'), createDefaultConfig(), context);

    expect(result.processing_errors).toEqual([]);
    expect(result.source_path).toBe('doc.png');
    expect(result.page_number).toBe(1);
    expect(result.output_path).toBeNull();
    expect(result.ocr_result?.text).toBe(ORDER_TEXT);
    expect(result.extracted_fields.expediente).toBe('EXP-2024-001');
    expect(result.extracted_fields.accion_solicitada?.startsWith('CONGELAR CUENTAS')).toBe(true);
    expect(result.extracted_fields.ocr_confidence).toBe(0.92);
  });

  it('passes the preprocessing switches through', async () => {
    const preprocessor = new FakePreprocessor();
    const context = fakeContext({ preprocessor });

    await processSingleImage(makeImage('doc.png'), createDefaultConfig({ deskew: false }), context);

    expect(preprocessor.calls).toEqual([{ remove_watermark: true, deskew: false, binarize: true }]);
  });

  it('passes the OCR languages through', async () => {
    const ocr = new FakeOcr({});
    const context = fakeContext({ ocr });

    await processSingleImage(
      makeImage('doc.png'),
      createDefaultConfig({ ocr_config: { language: 'eng', fallback_language: 'spa' } }),
      context
    );

    expect(ocr.configs).toEqual([{ language: 'eng', fallback_language: 'spa' }]);
  });

  it('records a preprocessing failure and stops', async () => {
    const ocr = new FakeOcr({});
    const context = fakeContext({ preprocessor: new FakePreprocessor(new Set(['doc.png#1'])), ocr });

    const result = await processSingleImage(makeImage('doc.png'), createDefaultConfig(), context);

    expect(result.processing_errors).toEqual(['Preprocessing failed: corrupt raster']);
    expect(result.ocr_result).toBeNull();
    expect(result.extracted_fields.expediente).toBeNull();
    expect(ocr.configs).toEqual([]);
  });

  it('records an OCR failure', async () => {
    const context = fakeContext({ ocr: new FakeOcr({}, new Set(['doc.png#1'])) });

    const result = await processSingleImage(makeImage('doc.png'), createDefaultConfig(), context);

    expect(result.processing_errors).toEqual(['OCR failed: engine crashed']);
    expect(result.ocr_result).toBeNull();
  });

  it('times out a collaborator that never answers', async () => {
    const hanging: OcrEngine = {
      recognize: () => new Promise<OCRResult>(() => undefined),
    };
    const context = fakeContext({ ocr: hanging }, { stageTimeoutMs: 20 });

    const result = await processSingleImage(makeImage('doc.png'), createDefaultConfig(), context);

    expect(result.processing_errors).toEqual(['OCR failed: OCR timed out after 20ms']);
  });

  it('records a rejection value that cannot be stringified', async () => {
    const hostile: OcrEngine = {
      recognize: () => Promise.reject(Object.create(null)),
    };
    const context = fakeContext({ ocr: hostile });

    const result = await processSingleImage(makeImage('doc.png'), createDefaultConfig(), context);

    expect(result.processing_errors).toEqual(['OCR failed: [object Object]']);
    expect(result.ocr_result).toBeNull();
  });

  it('keeps the OCR result when extraction fails', async () => {
    const broken: DocumentVocabulary = {
      ...DEFAULT_VOCABULARY,
      get months(): Record<string, number> {
        throw new Error('bad vocabulary');
      },
    };
    const context = fakeContext({ ocr: new FakeOcr({ 'doc.png#1': ORDER_TEXT }) }, { vocabulary: broken });

    const result = await processSingleImage(makeImage('doc.png'), createDefaultConfig(), context);

    expect(result.processing_errors).toEqual(['Field extraction failed: bad vocabulary']);
    expect(result.ocr_result?.text).toBe(ORDER_TEXT);
    expect(result.extracted_fields.expediente).toBeNull();
  });

  it('logs an extraction failure with its error code', async () => {
    const previousLevel = process.env.LOG_LEVEL;
    process.env.LOG_LEVEL = 'warn';
    const spy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const broken: DocumentVocabulary = {
      ...DEFAULT_VOCABULARY,
      get currencies(): DocumentVocabulary['currencies'] {
        throw new Error('no currencies');
      },
    };
    const context = fakeContext({ ocr: new FakeOcr({ 'doc.png#1': ORDER_TEXT }) }, { vocabulary: broken });

    try {
      await processSingleImage(makeImage('doc.png'), createDefaultConfig(), context);
    } finally {
      process.env.LOG_LEVEL = previousLevel;
      spy.mockRestore();
    }

    expect(spy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(spy.mock.calls[0]?.[0]))).toMatchObject({
      level: 'WARN',
      sourcePath: 'doc.png',
      pageNumber: 1,
      message: 'Field extraction failed',
      stage: 'EXTRACT',
      code: 'extraction_failed',
      error: 'no currencies',
    });
  });

  it('skips normalization and extraction when disabled', async () => {
    const context = fakeContext({ ocr: new FakeOcr({ 'doc.png#1': ORDER_TEXT }) });

    const result = await processSingleImage(
      makeImage('doc.png'),
      createDefaultConfig({ normalize_text: false, extract_sections: false }),
      context
    );

    expect(result.processing_errors).toEqual([]);
    expect(result.ocr_result).not.toBeNull();
    expect(result.extracted_fields).toBe(EMPTY_FIELDS);
  });
});

describe('processFile', () => {
  it('processes and writes every page of a multi-page file', async () => {
    const writer = new FakeWriter();
    const context = fakeContext({ loader: new FakeLoader({ 'a.pdf': 3 }), writer });

    const results = await processFile('a.pdf', createDefaultConfig(), 'out', context);

    expect(results.map((result) => result.page_number)).toEqual([1, 2, 3]);
    expect(results.map((result) => result.output_path)).toEqual([
      'out/a.pdf_1.json',
      'out/a.pdf_2.json',
      'out/a.pdf_3.json',
    ]);
    expect(writer.written.map(({ options }) => options.totalPages)).toEqual([3, 3, 3]);
  });

  it('passes a quality assessment to the writer', async () => {
    const writer = new FakeWriter();
    const context = fakeContext({ loader: new FakeLoader({ 'a.png': 1 }), writer });

    await processFile('a.png', createDefaultConfig(), 'out', context);

    expect(writer.written[0]?.options.quality).toEqual({ level: 'HIGH', requires_review: false, confidence: 0.92 });
  });

  it('returns a single error result for an unloadable file', async () => {
    const context = fakeContext({ loader: new FakeLoader({ 'bad.pdf': 'corrupt header' }) });

    const results = await processFile('bad.pdf', createDefaultConfig(), undefined, context);

    expect(results).toEqual([
      {
        source_path: 'bad.pdf',
        page_number: 1,
        ocr_result: null,
        extracted_fields: EMPTY_FIELDS,
        output_path: null,
        processing_errors: ['Failed to load file: corrupt header'],
      },
    ]);
  });

  it('treats a file with no pages as unloadable', async () => {
    const context = fakeContext({ loader: new FakeLoader({ 'empty.pdf': 0 }) });

    const results = await processFile('empty.pdf', createDefaultConfig(), undefined, context);

    expect(results.map((result) => result.processing_errors)).toEqual([['Failed to load file: no pages found']]);
  });

  it('wraps a loader that throws', async () => {
    const throwing: ImageLoader = {
      load: async () => {
        throw new Error('boom');
      },
    };
    const context = fakeContext({ loader: throwing });

    const results = await processFile('x.png', createDefaultConfig(), undefined, context);

    expect(results.map((result) => result.processing_errors)).toEqual([['Failed to load file: boom']]);
  });

  it('records a write failure on the page result', async () => {
    const context = fakeContext({
      loader: new FakeLoader({ 'a.png': 1 }),
      writer: new FakeWriter(new Set(['a.png'])),
    });

    const [result] = await processFile('a.png', createDefaultConfig(), 'out', context);

    expect(result?.processing_errors).toEqual(['Failed to write output: disk full']);
    expect(result?.output_path).toBeNull();
  });

  it('still writes pages that failed', async () => {
    const writer = new FakeWriter();
    const context = fakeContext({
      loader: new FakeLoader({ 'b.pdf': 2 }),
      ocr: new FakeOcr({}, new Set(['b.pdf#2'])),
      writer,
    });

    const results = await processFile('b.pdf', createDefaultConfig(), 'out', context);

    expect(writer.written).toHaveLength(2);
    expect(results.map((result) => result.processing_errors)).toEqual([[], ['OCR failed: engine crashed']]);
  });

  it('does not write without an output directory', async () => {
    const writer = new FakeWriter();
    const context = fakeContext({ loader: new FakeLoader({ 'a.png': 1 }), writer });

    const results = await processFile('a.png', createDefaultConfig(), undefined, context);

    expect(writer.written).toEqual([]);
    expect(results[0]?.output_path).toBeNull();
  });
});

/** OCR answering after a per-file delay, to interleave concurrent files */
class DelayedOcr implements OcrEngine {
  constructor(private readonly delays: Record<string, number>) {}

  async recognize(image: ImageData, config: OCRConfig): Promise<OCRResult> {
    await new Promise((resolve) => setTimeout(resolve, this.delays[image.source_path] ?? 0));
    return makeOcrResult(`${image.source_path} ${config.language}`);
  }
}

describe('processDirectory', () => {
  it('groups results by file in listing order, then by page', async () => {
    const context = fakeContext({
      lister: new FakeLister({ d: 'directory' }, { d: ['d/a.png', 'd/b.pdf'] }),
      loader: new FakeLoader({ 'd/a.png': 1, 'd/b.pdf': 2 }),
      ocr: new DelayedOcr({ 'd/a.png': 30, 'd/b.pdf': 1 }),
    });

    const results = await processDirectory('d', createDefaultConfig(), undefined, context);

    expect(results.map((result) => [result.source_path, result.page_number])).toEqual([
      ['d/a.png', 1],
      ['d/b.pdf', 1],
      ['d/b.pdf', 2],
    ]);
  });

  it('keeps going past an unloadable file', async () => {
    const context = fakeContext({
      lister: new FakeLister({ d: 'directory' }, { d: ['d/a.png', 'd/c.png'] }),
      loader: new FakeLoader({ 'd/a.png': 1 }),
    });

    const results = await processDirectory('d', createDefaultConfig(), undefined, context);

    expect(results.map((result) => result.processing_errors)).toEqual([
      [],
      ['Failed to load file: No such file: d/c.png'],
    ]);
  });

  it('reports a listing failure as a single result', async () => {
    const context = fakeContext({ lister: new FakeLister({ d: 'directory' }, { d: 'permission denied' }) });

    const results = await processDirectory('d', createDefaultConfig(), undefined, context);

    expect(results).toHaveLength(1);
    expect(results[0]?.source_path).toBe('d');
    expect(results[0]?.processing_errors).toEqual(['Failed to list directory: permission denied']);
  });

  it('returns nothing for an empty directory', async () => {
    const context = fakeContext({ lister: new FakeLister({ d: 'directory' }, { d: [] }) });

    await expect(processDirectory('d', createDefaultConfig(), undefined, context)).resolves.toEqual([]);
  });
});

describe('processPath', () => {
  it('dispatches a file', async () => {
    const context = fakeContext({
      lister: new FakeLister({ 'scan.png': 'file' }),
      loader: new FakeLoader({ 'scan.png': 1 }),
    });

    const results = await processPath('scan.png', context);

    expect(results.map((result) => result.source_path)).toEqual(['scan.png']);
  });

  it('dispatches a directory', async () => {
    const loader = new FakeLoader({ 'in/a.png': 1 });
    const context = fakeContext({
      lister: new FakeLister({ in: 'directory' }, { in: ['in/a.png'] }),
      loader,
    });

    await processPath('in', context);

    expect(loader.calls).toEqual(['in/a.png']);
  });

  it('rejects a missing path', async () => {
    const context = fakeContext();

    await expect(processPath('nope', context)).rejects.toThrow(PathNotFoundError);
    await expect(processPath('nope', context)).rejects.toThrow('Path does not exist: nope');
  });
});

describe('createDefaultConfig', () => {
  it('enables every step', () => {
    expect(createDefaultConfig()).toEqual({
      remove_watermark: true,
      deskew: true,
      binarize: true,
      extract_sections: true,
      normalize_text: true,
      ocr_config: { language: 'spa', fallback_language: 'eng' },
    });
  });

  it('overrides the OCR languages', () => {
    expect(createDefaultConfig({ ocr_config: { language: 'eng', fallback_language: 'spa' } }).ocr_config).toEqual({
      language: 'eng',
      fallback_language: 'spa',
    });
  });
});

