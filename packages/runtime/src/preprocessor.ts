/**
 * Image Preprocessor
 *
 * Watermark suppression, grayscale, deskew and binarization ahead of OCR.
 */

import sharp from 'sharp';
import {
  describeError,
  logger,
  PreprocessingError,
  type ImageData,
  type PixelBuffer,
  type PreprocessOptions,
  type Preprocessor,
} from '@expedientes/shared';
import { adaptiveThreshold, estimateSkewAngle, removeRedWatermark, toGrayscale } from './pixels';

/** Corrections smaller than this are not worth resampling for */
const MIN_SKEW_DEGREES = 0.25;

async function rotate(gray: PixelBuffer, angle: number): Promise<PixelBuffer> {
  const { data, info } = await sharp(gray.data, {
    raw: { width: gray.width, height: gray.height, channels: gray.channels },
  })
    .rotate(angle, { background: { r: 255, g: 255, b: 255 } })
    .raw()
    .toBuffer({ resolveWithObject: true });

  const rotated: PixelBuffer = { data, width: info.width, height: info.height, channels: info.channels };
  return rotated.channels === 1 ? rotated : toGrayscale(rotated);
}

export class SharpPreprocessor implements Preprocessor {
  async preprocess(image: ImageData, options: PreprocessOptions): Promise<ImageData> {
    try {
      return { ...image, pixels: await this.transform(image.pixels, options) };
    } catch (error) {
      throw new PreprocessingError(describeError(error), { cause: error });
    }
  }

  private async transform(input: PixelBuffer, options: PreprocessOptions): Promise<PixelBuffer> {
    let pixels = input;

    if (options.remove_watermark) {
      pixels = removeRedWatermark(pixels);
    }

    pixels = toGrayscale(pixels);

    if (options.deskew) {
      const angle = estimateSkewAngle(pixels);
      if (Math.abs(angle) >= MIN_SKEW_DEGREES) {
        logger.debug('Deskewing page', { angle });
        pixels = await rotate(pixels, angle);
      }
    }

    if (options.binarize) {
      pixels = adaptiveThreshold(pixels);
    }

    return pixels;
  }
}
