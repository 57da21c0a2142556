/**
 * Pixel Transforms
 *
 * Pure operations on raw interleaved pixel buffers. Each returns a new
 * buffer; inputs are never written to.
 */

import type { PixelBuffer } from '@expedientes/shared';

const WHITE = 255;

function rgbAt(pixels: PixelBuffer, offset: number): [number, number, number] {
  const { data, channels } = pixels;
  if (channels < 3) {
    const v = data[offset];
    return [v, v, v];
  }
  return [data[offset], data[offset + 1], data[offset + 2]];
}

/**
 * Luma (BT.601) of every pixel as a single-channel buffer.
 */
export function toGrayscale(pixels: PixelBuffer): PixelBuffer {
  const { width, height, channels } = pixels;
  const out = Buffer.alloc(width * height);

  for (let i = 0; i < width * height; i++) {
    const [r, g, b] = rgbAt(pixels, i * channels);
    out[i] = Math.round(0.299 * r + 0.587 * g + 0.114 * b);
  }

  return { data: out, width, height, channels: 1 };
}

// ============================================================================
// Red watermark suppression
// ============================================================================

export interface RedMaskThresholds {
  /** Hue distance from pure red, in degrees */
  hueRange: number;
  /** Minimum saturation, 0..255 */
  minSaturation: number;
  /** Minimum value, 0..255 */
  minValue: number;
}

export const DEFAULT_RED_MASK: RedMaskThresholds = { hueRange: 20, minSaturation: 80, minValue: 80 };

function isVividRed(r: number, g: number, b: number, thresholds: RedMaskThresholds): boolean {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  if (max < thresholds.minValue || max === 0) return false;

  const saturation = ((max - min) / max) * 255;
  if (saturation <= thresholds.minSaturation || max !== r) return false;

  // Hue of a red-dominant pixel, in (-60, 60) degrees
  const hue = (60 * (g - b)) / (max - min);
  return Math.abs(hue) < thresholds.hueRange;
}

/**
 * Mask of vivid red pixels, grown by one pixel in every direction.
 */
export function redWatermarkMask(
  pixels: PixelBuffer,
  thresholds: RedMaskThresholds = DEFAULT_RED_MASK
): Uint8Array {
  const { width, height, channels } = pixels;
  const raw = new Uint8Array(width * height);
  if (channels < 3) return raw;

  for (let i = 0; i < width * height; i++) {
    const [r, g, b] = rgbAt(pixels, i * channels);
    if (isVividRed(r, g, b, thresholds)) raw[i] = 1;
  }

  const grown = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (!raw[y * width + x]) continue;
      for (let dy = -1; dy <= 1; dy++) {
        for (let dx = -1; dx <= 1; dx++) {
          const ny = y + dy;
          const nx = x + dx;
          if (ny >= 0 && ny < height && nx >= 0 && nx < width) grown[ny * width + nx] = 1;
        }
      }
    }
  }
  return grown;
}

/**
 * Replace red marks with the mean of the unmasked pixels around them, or
 * white when the whole neighbourhood is masked.
 */
export function removeRedWatermark(
  pixels: PixelBuffer,
  thresholds: RedMaskThresholds = DEFAULT_RED_MASK,
  radius = 3
): PixelBuffer {
  const { width, height, channels } = pixels;
  const out = Buffer.from(pixels.data);
  if (channels < 3) return { ...pixels, data: out };

  const mask = redWatermarkMask(pixels, thresholds);
  const colorChannels = Math.min(channels, 3);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (!mask[y * width + x]) continue;

      const sums = [0, 0, 0];
      let count = 0;
      for (let ny = Math.max(0, y - radius); ny <= Math.min(height - 1, y + radius); ny++) {
        for (let nx = Math.max(0, x - radius); nx <= Math.min(width - 1, x + radius); nx++) {
          if (mask[ny * width + nx]) continue;
          const offset = (ny * width + nx) * channels;
          for (let c = 0; c < colorChannels; c++) sums[c] += pixels.data[offset + c];
          count++;
        }
      }

      const offset = (y * width + x) * channels;
      for (let c = 0; c < colorChannels; c++) {
        out[offset + c] = count > 0 ? Math.round(sums[c] / count) : WHITE;
      }
    }
  }

  return { ...pixels, data: out };
}

// ============================================================================
// Skew estimation
// ============================================================================

export interface SkewSearch {
  /** Largest correction tried, in degrees */
  maxAngle: number;
  step: number;
  /** Gray level below which a pixel counts as ink */
  inkThreshold: number;
  /** Ink pixels sampled at most */
  maxSamples: number;
}

export const DEFAULT_SKEW_SEARCH: SkewSearch = { maxAngle: 10, step: 0.5, inkThreshold: 128, maxSamples: 200_000 };

/**
 * Angle (degrees, clockwise) that best aligns text lines with rows, found by
 * maximizing the sharpness of the horizontal projection profile.
 *
 * @param gray - Single-channel image
 */
export function estimateSkewAngle(gray: PixelBuffer, search: SkewSearch = DEFAULT_SKEW_SEARCH): number {
  const { width, height, data } = gray;
  const xs: number[] = [];
  const ys: number[] = [];

  let inkCount = 0;
  for (let i = 0; i < width * height; i++) {
    if (data[i] < search.inkThreshold) inkCount++;
  }
  if (inkCount === 0) return 0;

  const stride = Math.max(1, Math.ceil(inkCount / search.maxSamples));
  let seen = 0;
  for (let i = 0; i < width * height; i++) {
    if (data[i] >= search.inkThreshold) continue;
    if (seen++ % stride !== 0) continue;
    xs.push(i % width);
    ys.push(Math.floor(i / width));
  }

  const diagonal = Math.ceil(Math.hypot(width, height));
  const bins = new Float64Array(2 * diagonal + 1);
  let bestAngle = 0;
  let bestScore = -1;

  const steps = Math.round(search.maxAngle / search.step);
  for (let k = -steps; k <= steps; k++) {
    const angle = k * search.step;
    const radians = (angle * Math.PI) / 180;
    const sin = Math.sin(radians);
    const cos = Math.cos(radians);

    bins.fill(0);
    for (let j = 0; j < xs.length; j++) {
      bins[Math.round(xs[j] * sin + ys[j] * cos) + diagonal]++;
    }

    let score = 0;
    for (const count of bins) score += count * count;

    // Ties keep the smaller correction
    if (score > bestScore || (score === bestScore && Math.abs(angle) < Math.abs(bestAngle))) {
      bestScore = score;
      bestAngle = angle;
    }
  }

  return bestAngle;
}

// ============================================================================
// Binarization
// ============================================================================

/**
 * Adaptive mean threshold: a pixel is white when it is brighter than the
 * mean of its window minus `offset`. Dark text stays black on white.
 *
 * @param gray - Single-channel image
 * @param windowSize - Odd side length of the square window
 */
export function adaptiveThreshold(gray: PixelBuffer, windowSize = 41, offset = 11): PixelBuffer {
  const { width, height, data } = gray;
  const integral = new Float64Array((width + 1) * (height + 1));

  for (let y = 0; y < height; y++) {
    let rowSum = 0;
    for (let x = 0; x < width; x++) {
      rowSum += data[y * width + x];
      integral[(y + 1) * (width + 1) + (x + 1)] = integral[y * (width + 1) + (x + 1)] + rowSum;
    }
  }

  const half = Math.floor(windowSize / 2);
  const out = Buffer.alloc(width * height);

  for (let y = 0; y < height; y++) {
    const y0 = Math.max(0, y - half);
    const y1 = Math.min(height, y + half + 1);
    for (let x = 0; x < width; x++) {
      const x0 = Math.max(0, x - half);
      const x1 = Math.min(width, x + half + 1);
      const sum =
        integral[y1 * (width + 1) + x1] -
        integral[y0 * (width + 1) + x1] -
        integral[y1 * (width + 1) + x0] +
        integral[y0 * (width + 1) + x0];
      const mean = sum / ((y1 - y0) * (x1 - x0));
      out[y * width + x] = data[y * width + x] > mean - offset ? WHITE : 0;
    }
  }

  return { data: out, width, height, channels: 1 };
}
