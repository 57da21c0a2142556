/**
 * Pixel Transform and Confidence Statistics Tests
 */

import type { PixelBuffer } from '@expedientes/shared';
import { summarizeConfidences } from '../../packages/runtime/src/confidence';
import {
  adaptiveThreshold,
  estimateSkewAngle,
  redWatermarkMask,
  removeRedWatermark,
  toGrayscale,
} from '../../packages/runtime/src/pixels';

function rgbImage(width: number, height: number, paint: (x: number, y: number) => Rgb): PixelBuffer {
  const data = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      data.set(paint(x, y), (y * width + x) * 3);
    }
  }
  return { data, width, height, channels: 3 };
}

function grayImage(width: number, height: number, fill: number): PixelBuffer {
  return { data: Buffer.alloc(width * height, fill), width, height, channels: 1 };
}

type Rgb = [number, number, number];

const WHITE: Rgb = [255, 255, 255];
const STAMP_RED: Rgb = [220, 20, 30];

function row(colors: Rgb[]): PixelBuffer {
  return rgbImage(colors.length, 1, (x) => colors[x] ?? WHITE);
}

describe('toGrayscale', () => {
  it('weights channels by luma', () => {
    const image = row([WHITE, [255, 0, 0], [0, 255, 0], [0, 0, 255]]);
    expect([...toGrayscale(image).data]).toEqual([255, 76, 150, 29]);
  });
});

describe('redWatermarkMask', () => {
  it('marks vivid red and its neighbours', () => {
    const image = rgbImage(3, 3, (x, y) => (x === 1 && y === 1 ? STAMP_RED : WHITE));
    expect([...redWatermarkMask(image)]).toEqual([1, 1, 1, 1, 1, 1, 1, 1, 1]);
  });

  it('ignores dark, blue and gray pixels', () => {
    const image = row([[30, 30, 30], [20, 30, 220], [128, 128, 128]]);
    expect([...redWatermarkMask(image)]).toEqual([0, 0, 0]);
  });
});

describe('removeRedWatermark', () => {
  it('paints red marks with the surrounding paper', () => {
    const image = rgbImage(7, 7, (x, y) => (x === 3 && y === 3 ? STAMP_RED : WHITE));

    const cleaned = removeRedWatermark(image);

    expect(cleaned.data.every((value) => value === 255)).toBe(true);
    expect([...image.data.subarray((3 * 7 + 3) * 3, (3 * 7 + 3) * 3 + 3)]).toEqual(STAMP_RED);
  });

  it('copies single-channel images unchanged', () => {
    const gray = grayImage(2, 2, 90);

    const cleaned = removeRedWatermark(gray);

    expect(cleaned.data).not.toBe(gray.data);
    expect([...cleaned.data]).toEqual([90, 90, 90, 90]);
  });
});

describe('estimateSkewAngle', () => {
  it('returns zero for a blank page', () => {
    expect(estimateSkewAngle(grayImage(50, 50, 255))).toBe(0);
  });

  it('returns zero for a level line', () => {
    const image = grayImage(100, 20, 255);
    image.data.fill(0, 10 * 100, 11 * 100);
    expect(estimateSkewAngle(image)).toBe(0);
  });

  it('finds the angle of a tilted line', () => {
    const width = 400;
    const image = grayImage(width, 60, 255);
    const slope = Math.tan((3 * Math.PI) / 180);
    for (let x = 0; x < width; x++) {
      image.data[Math.round(50 - x * slope) * width + x] = 0;
    }
    expect(estimateSkewAngle(image)).toBe(3);
  });
});

describe('adaptiveThreshold', () => {
  it('keeps dark marks black on a white field', () => {
    const image = grayImage(3, 3, 200);
    image.data[4] = 50;

    expect([...adaptiveThreshold(image, 3, 11).data]).toEqual([255, 255, 255, 255, 0, 255, 255, 255, 255]);
  });

  it('turns a uniform page white', () => {
    expect([...adaptiveThreshold(grayImage(5, 5, 200)).data].every((value) => value === 255)).toBe(true);
  });
});

describe('summarizeConfidences', () => {
  it('clamps, drops non-finite values and takes average and median', () => {
    expect(summarizeConfidences([90, 80, 101, -5, NaN])).toEqual({
      confidences: [90, 80, 100, 0],
      average: 67.5,
      median: 85,
    });
  });

  it('takes the middle value of an odd count', () => {
    expect(summarizeConfidences([10, 70, 40]).median).toBe(40);
  });

  it('yields zeros for no tokens', () => {
    expect(summarizeConfidences([])).toEqual({ confidences: [], average: 0, median: 0 });
  });
});
