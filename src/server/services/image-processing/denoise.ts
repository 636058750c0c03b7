/**
 * Non-local means denoising for single-channel images.
 *
 * Every pixel becomes a weighted mean of the pixels in its search window,
 * weighted by how similar their surrounding template patches are. Patch
 * distances for one search offset are box sums over a squared-difference
 * image, computed with an integral image, so the cost is
 * O(width * height * searchWindow²) independent of the template size.
 */

import type { GrayImage } from '../../types/document.js';

export interface DenoiseOptions {
  /** Odd patch size compared around each pixel (default 7) */
  templateWindowSize?: number;
  /** Odd neighbourhood size searched for similar patches (default 21) */
  searchWindowSize?: number;
  /** Filter strength; larger values remove more noise and more detail (default 10) */
  h?: number;
}

export const DEFAULT_DENOISE_OPTIONS: Required<DenoiseOptions> = {
  templateWindowSize: 7,
  searchWindowSize: 21,
  h: 10,
};

function halfWindow(size: number, name: string): number {
  if (!Number.isInteger(size) || size < 1 || size % 2 === 0) {
    throw new RangeError(`${name} must be a positive odd integer, got ${size}`);
  }
  return (size - 1) / 2;
}

export function nonLocalMeansDenoise(image: GrayImage, options: DenoiseOptions = {}): GrayImage {
  const { templateWindowSize, searchWindowSize, h } = { ...DEFAULT_DENOISE_OPTIONS, ...options };
  const templateRadius = halfWindow(templateWindowSize, 'templateWindowSize');
  const searchRadius = halfWindow(searchWindowSize, 'searchWindowSize');
  if (!(h > 0)) {
    throw new RangeError(`h must be positive, got ${h}`);
  }

  const { data, width, height } = image;
  const pixelCount = width * height;
  const out = new Uint8Array(pixelCount);
  if (pixelCount === 0) {
    return { data: out, width, height };
  }

  const invH2 = 1 / (h * h);
  const weightSum = new Float64Array(pixelCount);
  const valueSum = new Float64Array(pixelCount);
  const stride = width + 1;
  const integral = new Float64Array(stride * (height + 1));
  const maxX = width - 1;
  const maxY = height - 1;

  for (let dy = -searchRadius; dy <= searchRadius; dy++) {
    for (let dx = -searchRadius; dx <= searchRadius; dx++) {
      // Integral image of squared differences between each pixel and its offset partner
      for (let y = 0; y < height; y++) {
        const qy = Math.min(maxY, Math.max(0, y + dy));
        let rowSum = 0;
        const rowBase = y * width;
        const partnerBase = qy * width;
        const outRow = (y + 1) * stride;
        const prevRow = y * stride;
        for (let x = 0; x < width; x++) {
          const qx = Math.min(maxX, Math.max(0, x + dx));
          const diff = data[rowBase + x] - data[partnerBase + qx];
          rowSum += diff * diff;
          integral[outRow + x + 1] = integral[prevRow + x + 1] + rowSum;
        }
      }

      for (let y = 0; y < height; y++) {
        const y0 = Math.max(0, y - templateRadius);
        const y1 = Math.min(maxY, y + templateRadius);
        const qy = Math.min(maxY, Math.max(0, y + dy));
        for (let x = 0; x < width; x++) {
          const x0 = Math.max(0, x - templateRadius);
          const x1 = Math.min(maxX, x + templateRadius);
          const boxSum =
            integral[(y1 + 1) * stride + x1 + 1] -
            integral[y0 * stride + x1 + 1] -
            integral[(y1 + 1) * stride + x0] +
            integral[y0 * stride + x0];
          const area = (x1 - x0 + 1) * (y1 - y0 + 1);
          const weight = Math.exp(-(boxSum / area) * invH2);
          const qx = Math.min(maxX, Math.max(0, x + dx));
          const index = y * width + x;
          weightSum[index] += weight;
          valueSum[index] += weight * data[qy * width + qx];
        }
      }
    }
  }

  for (let i = 0; i < pixelCount; i++) {
    // The zero offset always contributes weight 1, so weightSum is never 0
    out[i] = Math.min(255, Math.max(0, Math.round(valueSum[i] / weightSum[i])));
  }
  return { data: out, width, height };
}
