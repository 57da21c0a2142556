/**
 * Image Loader
 *
 * Decodes raster images (including multi-page TIFF) with sharp and
 * rasterizes PDF pages with pdf-to-png-converter.
 */

import path from 'node:path';
import sharp from 'sharp';
import {
  config,
  describeError,
  err,
  LoadError,
  logger,
  ok,
  type ImageData,
  type ImageLoader,
  type LoadOptions,
  type PixelBuffer,
  type Result,
} from '@expedientes/shared';

/** PDF user-space units per inch */
const PDF_POINTS_PER_INCH = 72;

async function decode(input: string | Buffer, page?: number): Promise<PixelBuffer> {
  const image = page === undefined ? sharp(input) : sharp(input, { page });
  const { data, info } = await image.raw().toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height, channels: info.channels };
}

function toPages(sourcePath: string, pixels: PixelBuffer[]): ImageData[] {
  return pixels.map((page, index) => ({
    pixels: page,
    source_path: sourcePath,
    page_number: index + 1,
    total_pages: pixels.length,
  }));
}

export class SharpImageLoader implements ImageLoader {
  private readonly extensions: ReadonlySet<string>;

  constructor(extensions: readonly string[] = config.supportedExtensions) {
    this.extensions = new Set(extensions.map((ext) => ext.toLowerCase()));
  }

  async load(filePath: string, options: LoadOptions): Promise<Result<ImageData[], LoadError>> {
    const extension = path.extname(filePath).toLowerCase();
    if (!this.extensions.has(extension)) {
      return err(new LoadError(`Unsupported file type: ${extension || '(none)'}`));
    }

    try {
      const pixels = extension === '.pdf' ? await this.rasterizePdf(filePath, options.dpi) : await this.decodeImage(filePath);
      logger.debug('Decoded pages', { pages: pixels.length });
      return ok(toPages(filePath, pixels));
    } catch (error) {
      return err(new LoadError(describeError(error), { cause: error }));
    }
  }

  private async decodeImage(filePath: string): Promise<PixelBuffer[]> {
    const metadata = await sharp(filePath).metadata();
    const pageCount = metadata.pages ?? 1;
    if (pageCount <= 1) {
      return [await decode(filePath)];
    }

    const pages: PixelBuffer[] = [];
    for (let page = 0; page < pageCount; page++) {
      pages.push(await decode(filePath, page));
    }
    return pages;
  }

  private async rasterizePdf(filePath: string, dpi: number): Promise<PixelBuffer[]> {
    // Loaded on first PDF
    const { pdfToPng } = await import('pdf-to-png-converter');
    const rendered = await pdfToPng(filePath, { viewportScale: dpi / PDF_POINTS_PER_INCH });
    const pages: PixelBuffer[] = [];

    for (const page of rendered) {
      if (!page.content) {
        throw new Error(`Page ${page.pageNumber} rendered no content`);
      }
      pages.push(await decode(page.content));
    }
    return pages;
  }
}
