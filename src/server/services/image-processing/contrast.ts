/**
 * Contrast strategies for the normalizer.
 *
 * - CLAHE keeps gradients and suits ordinary lighting.
 * - Otsu binarization separates ink from a tinted background by luminance.
 */

import type { GrayImage } from '../../types/document.js';

const HIST_SIZE = 256;

export interface ClaheOptions {
  /** Contrast limit relative to a uniform histogram (default 2.0) */
  clipLimit?: number;
  /** Number of tiles along each axis (default 8) */
  tileGridSize?: number;
}

export const DEFAULT_CLAHE_OPTIONS: Required<ClaheOptions> = {
  clipLimit: 2.0,
  tileGridSize: 8,
};

function buildTileLut(
  data: Uint8Array,
  width: number,
  xStart: number,
  xEnd: number,
  yStart: number,
  yEnd: number,
  clipLimit: number
): Float64Array {
  const histogram = new Float64Array(HIST_SIZE);
  for (let y = yStart; y < yEnd; y++) {
    const row = y * width;
    for (let x = xStart; x < xEnd; x++) {
      histogram[data[row + x]]++;
    }
  }

  const area = (xEnd - xStart) * (yEnd - yStart);
  const lut = new Float64Array(HIST_SIZE);
  if (area === 0) {
    for (let i = 0; i < HIST_SIZE; i++) lut[i] = i;
    return lut;
  }

  const limit = Math.max(1, (clipLimit * area) / HIST_SIZE);
  let excess = 0;
  for (let i = 0; i < HIST_SIZE; i++) {
    if (histogram[i] > limit) {
      excess += histogram[i] - limit;
      histogram[i] = limit;
    }
  }
  const share = excess / HIST_SIZE;

  let cumulative = 0;
  const scale = 255 / area;
  for (let i = 0; i < HIST_SIZE; i++) {
    cumulative += histogram[i] + share;
    lut[i] = Math.min(255, cumulative * scale);
  }
  return lut;
}

/**
 * Contrast-limited adaptive histogram equalization with bilinear
 * interpolation between neighbouring tile mappings.
 */
export function applyClahe(image: GrayImage, options: ClaheOptions = {}): GrayImage {
  const { clipLimit, tileGridSize } = { ...DEFAULT_CLAHE_OPTIONS, ...options };
  if (!(clipLimit > 0) || !Number.isInteger(tileGridSize) || tileGridSize < 1) {
    throw new RangeError(`Invalid CLAHE options: clipLimit=${clipLimit}, tileGridSize=${tileGridSize}`);
  }

  const { data, width, height } = image;
  const out = new Uint8Array(width * height);
  if (width === 0 || height === 0) {
    return { data: out, width, height };
  }

  const tilesX = Math.min(tileGridSize, width);
  const tilesY = Math.min(tileGridSize, height);
  const tileWidth = width / tilesX;
  const tileHeight = height / tilesY;

  const luts: Float64Array[] = [];
  for (let ty = 0; ty < tilesY; ty++) {
    const yStart = Math.floor(ty * tileHeight);
    const yEnd = Math.floor((ty + 1) * tileHeight);
    for (let tx = 0; tx < tilesX; tx++) {
      const xStart = Math.floor(tx * tileWidth);
      const xEnd = Math.floor((tx + 1) * tileWidth);
      luts.push(buildTileLut(data, width, xStart, xEnd, yStart, yEnd, clipLimit));
    }
  }

  for (let y = 0; y < height; y++) {
    const gy = (y + 0.5) / tileHeight - 0.5;
    const ty1 = Math.max(0, Math.floor(gy));
    const ty2 = Math.min(tilesY - 1, ty1 + 1);
    const wy = Math.min(1, Math.max(0, gy - ty1));

    for (let x = 0; x < width; x++) {
      const gx = (x + 0.5) / tileWidth - 0.5;
      const tx1 = Math.max(0, Math.floor(gx));
      const tx2 = Math.min(tilesX - 1, tx1 + 1);
      const wx = Math.min(1, Math.max(0, gx - tx1));

      const v = data[y * width + x];
      const top = luts[ty1 * tilesX + tx1][v] * (1 - wx) + luts[ty1 * tilesX + tx2][v] * wx;
      const bottom = luts[ty2 * tilesX + tx1][v] * (1 - wx) + luts[ty2 * tilesX + tx2][v] * wx;
      out[y * width + x] = Math.round(top * (1 - wy) + bottom * wy);
    }
  }

  return { data: out, width, height };
}

/**
 * Global threshold that maximizes between-class variance.
 */
export function otsuThreshold(image: GrayImage): number {
  const { data, width, height } = image;
  const total = width * height;
  if (total === 0) return 0;

  const histogram = new Float64Array(HIST_SIZE);
  for (let i = 0; i < total; i++) {
    histogram[data[i]]++;
  }

  let weightedTotal = 0;
  for (let i = 0; i < HIST_SIZE; i++) weightedTotal += i * histogram[i];

  let backgroundWeight = 0;
  let backgroundSum = 0;
  let bestVariance = -1;
  let threshold = 0;

  for (let t = 0; t < HIST_SIZE; t++) {
    backgroundWeight += histogram[t];
    if (backgroundWeight === 0) continue;
    const foregroundWeight = total - backgroundWeight;
    if (foregroundWeight === 0) break;

    backgroundSum += t * histogram[t];
    const backgroundMean = backgroundSum / backgroundWeight;
    const foregroundMean = (weightedTotal - backgroundSum) / foregroundWeight;
    const diff = backgroundMean - foregroundMean;
    const variance = backgroundWeight * foregroundWeight * diff * diff;
    if (variance > bestVariance) {
      bestVariance = variance;
      threshold = t;
    }
  }

  return threshold;
}

/**
 * Collapse to pure black/white: values above the Otsu threshold become 255.
 */
export function binarizeOtsu(image: GrayImage): { image: GrayImage; threshold: number } {
  const threshold = otsuThreshold(image);
  const { data, width, height } = image;
  const out = new Uint8Array(width * height);
  for (let i = 0; i < out.length; i++) {
    out[i] = data[i] > threshold ? 255 : 0;
  }
  return { image: { data: out, width, height }, threshold };
}
