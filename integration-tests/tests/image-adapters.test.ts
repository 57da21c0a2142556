/**
 * Image Loader and Preprocessor Tests
 *
 * Images are generated with sharp into a temporary directory.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import sharp from 'sharp';
import { LoadError, PreprocessingError, type ImageData } from '@expedientes/shared';
import { SharpImageLoader } from '../../packages/runtime/src/image-loader';
import { SharpPreprocessor } from '../../packages/runtime/src/preprocessor';

describe('SharpImageLoader', () => {
  let dir: string;
  const loader = new SharpImageLoader(['.png', '.pdf']);

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'expedientes-img-'));
    await sharp({ create: { width: 4, height: 3, channels: 3, background: { r: 255, g: 0, b: 0 } } })
      .png()
      .toFile(path.join(dir, 'sello.png'));
    await fs.writeFile(path.join(dir, 'roto.png'), 'not an image');
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('decodes a raster image into one page', async () => {
    const filePath = path.join(dir, 'sello.png');

    const loaded = await loader.load(filePath, { dpi: 300 });

    expect(loaded.ok).toBe(true);
    if (loaded.ok) {
      expect(loaded.value).toHaveLength(1);
      const [page] = loaded.value;
      expect(page?.source_path).toBe(filePath);
      expect(page?.page_number).toBe(1);
      expect(page?.total_pages).toBe(1);
      expect(page?.pixels).toMatchObject({ width: 4, height: 3, channels: 3 });
      expect([...(page?.pixels.data.subarray(0, 3) ?? [])]).toEqual([255, 0, 0]);
    }
  });

  it('refuses unsupported extensions', async () => {
    const loaded = await loader.load(path.join(dir, 'scan.bmp'), { dpi: 300 });

    expect(loaded.ok).toBe(false);
    if (!loaded.ok) expect(loaded.error.message).toBe('Unsupported file type: .bmp');
  });

  it('reports an undecodable file as a load error', async () => {
    const loaded = await loader.load(path.join(dir, 'roto.png'), { dpi: 300 });

    expect(loaded.ok).toBe(false);
    if (!loaded.ok) expect(loaded.error).toBeInstanceOf(LoadError);
  });
});

describe('SharpPreprocessor', () => {
  const preprocessor = new SharpPreprocessor();
  const blank = {
    pixels: { data: Buffer.alloc(10 * 10 * 3, 255), width: 10, height: 10, channels: 3 as const },
    source_path: 'blank.png',
    page_number: 1,
    total_pages: 1,
  };

  it('returns a new single-channel page', async () => {
    const processed = await preprocessor.preprocess(blank, { remove_watermark: true, deskew: true, binarize: true });

    expect(processed).not.toBe(blank);
    expect(processed.source_path).toBe('blank.png');
    expect(processed.pixels).toMatchObject({ width: 10, height: 10, channels: 1 });
    expect(processed.pixels.data.every((value) => value === 255)).toBe(true);
    expect(blank.pixels.channels).toBe(3);
  });

  it('wraps a transform failure in a PreprocessingError', async () => {
    const malformed: ImageData = {
      pixels: { data: Buffer.alloc(0), width: -1, height: 1, channels: 1 },
      source_path: 'malformed.png',
      page_number: 1,
      total_pages: 1,
    };

    const outcome = preprocessor.preprocess(malformed, { remove_watermark: false, deskew: false, binarize: false });

    await expect(outcome).rejects.toBeInstanceOf(PreprocessingError);
    await expect(outcome).rejects.toMatchObject({ code: 'preprocessing_failed', stage: 'PREPROCESS' });
  });

  it('removes a red stamp from the page', async () => {
    const data = Buffer.alloc(9 * 9 * 3, 255);
    data.set([220, 20, 30], (4 * 9 + 4) * 3);
    const stamped = { ...blank, pixels: { data, width: 9, height: 9, channels: 3 as const } };

    const processed = await preprocessor.preprocess(stamped, {
      remove_watermark: true,
      deskew: false,
      binarize: false,
    });

    expect(processed.pixels.data.every((value) => value === 255)).toBe(true);
  });
});
