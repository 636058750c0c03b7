/**
 * Skew detection and correction.
 *
 * Canny edges feed a standard Hough line transform; each detected line's
 * angle from horizontal text direction is `theta - 90°`, and the page skew is
 * the median of those angles so short stray edges do not dominate.
 */

import type { GrayImage } from '../../types/document.js';

export interface DeskewOptions {
  /** Canny hysteresis thresholds on the L1 Sobel magnitude */
  lowThreshold?: number;
  highThreshold?: number;
  /** Minimum Hough votes for a line (default 200) */
  houghThreshold?: number;
  /** Skews at or above this magnitude are left alone (default 15°) */
  maxAngle?: number;
  /** Skews below this magnitude are treated as straight (default 0.5°) */
  minAngle?: number;
}

export const DEFAULT_DESKEW_OPTIONS: Required<DeskewOptions> = {
  lowThreshold: 50,
  highThreshold: 150,
  houghThreshold: 200,
  maxAngle: 15,
  minAngle: 0.5,
};

export interface HoughLine {
  rho: number;
  /** Normal angle in radians, [0, π) */
  theta: number;
  votes: number;
}

export interface DeskewResult {
  image: GrayImage;
  /** Median line angle in degrees, null when no line was detected */
  angle: number | null;
  rotated: boolean;
  reason: 'rotated' | 'no-lines' | 'below-minimum' | 'above-maximum';
}

const THETA_STEPS = 180;
const THETA_STEP = Math.PI / THETA_STEPS;

/**
 * Canny edge detector: 3x3 Sobel gradients, non-maximum suppression along the
 * quantized gradient direction, then hysteresis linking of weak edges to
 * strong ones. Returns a mask with 255 on edge pixels.
 */
export function detectEdges(
  image: GrayImage,
  lowThreshold = DEFAULT_DESKEW_OPTIONS.lowThreshold,
  highThreshold = DEFAULT_DESKEW_OPTIONS.highThreshold
): Uint8Array {
  const { data, width, height } = image;
  const pixelCount = width * height;
  const edges = new Uint8Array(pixelCount);
  if (width < 3 || height < 3) return edges;

  const magnitude = new Float32Array(pixelCount);
  const direction = new Uint8Array(pixelCount);
  const tan22 = Math.tan(Math.PI / 8);
  const tan67 = Math.tan((3 * Math.PI) / 8);

  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const i = y * width + x;
      const tl = data[i - width - 1];
      const tc = data[i - width];
      const tr = data[i - width + 1];
      const ml = data[i - 1];
      const mr = data[i + 1];
      const bl = data[i + width - 1];
      const bc = data[i + width];
      const br = data[i + width + 1];

      const gx = tr + 2 * mr + br - tl - 2 * ml - bl;
      const gy = bl + 2 * bc + br - tl - 2 * tc - tr;
      magnitude[i] = Math.abs(gx) + Math.abs(gy);

      // 0: horizontal gradient, 1: 45°, 2: vertical, 3: 135°
      const ax = Math.abs(gx);
      const ay = Math.abs(gy);
      if (ay <= ax * tan22) {
        direction[i] = 0;
      } else if (ay >= ax * tan67) {
        direction[i] = 2;
      } else {
        direction[i] = (gx > 0) === (gy > 0) ? 1 : 3;
      }
    }
  }

  // 0 = suppressed, 1 = weak, 2 = strong
  const state = new Uint8Array(pixelCount);
  const stack: number[] = [];

  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const i = y * width + x;
      const m = magnitude[i];
      if (m <= lowThreshold) continue;

      let before: number;
      let after: number;
      switch (direction[i]) {
        case 0:
          before = magnitude[i - 1];
          after = magnitude[i + 1];
          break;
        case 2:
          before = magnitude[i - width];
          after = magnitude[i + width];
          break;
        case 1:
          before = magnitude[i - width - 1];
          after = magnitude[i + width + 1];
          break;
        default:
          before = magnitude[i - width + 1];
          after = magnitude[i + width - 1];
          break;
      }

      // Asymmetric comparison keeps exactly one pixel of a two-pixel plateau
      if (m > before && m >= after) {
        if (m > highThreshold) {
          state[i] = 2;
          stack.push(i);
        } else {
          state[i] = 1;
        }
      }
    }
  }

  while (stack.length > 0) {
    const i = stack.pop();
    if (i === undefined) break;
    edges[i] = 255;
    const x = i % width;
    const y = (i - x) / width;
    for (let ny = Math.max(0, y - 1); ny <= Math.min(height - 1, y + 1); ny++) {
      for (let nx = Math.max(0, x - 1); nx <= Math.min(width - 1, x + 1); nx++) {
        const n = ny * width + nx;
        if (state[n] === 1) {
          state[n] = 2;
          stack.push(n);
        }
      }
    }
  }

  return edges;
}

/**
 * Standard Hough transform over an edge mask (ρ step 1px, θ step 1°).
 * Returns accumulator peaks above the vote threshold, strongest first.
 */
export function houghLines(edges: Uint8Array, width: number, height: number, threshold: number): HoughLine[] {
  const maxRho = width + height;
  const rhoBins = 2 * maxRho + 1;
  const accumulator = new Int32Array(THETA_STEPS * rhoBins);

  const cosTable = new Float64Array(THETA_STEPS);
  const sinTable = new Float64Array(THETA_STEPS);
  for (let t = 0; t < THETA_STEPS; t++) {
    cosTable[t] = Math.cos(t * THETA_STEP);
    sinTable[t] = Math.sin(t * THETA_STEP);
  }

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (edges[y * width + x] === 0) continue;
      for (let t = 0; t < THETA_STEPS; t++) {
        const rho = Math.round(x * cosTable[t] + y * sinTable[t]) + maxRho;
        accumulator[t * rhoBins + rho]++;
      }
    }
  }

  const lines: HoughLine[] = [];
  for (let t = 0; t < THETA_STEPS; t++) {
    for (let r = 0; r < rhoBins; r++) {
      const index = t * rhoBins + r;
      const votes = accumulator[index];
      if (votes <= threshold) continue;

      const left = r > 0 ? accumulator[index - 1] : 0;
      const right = r < rhoBins - 1 ? accumulator[index + 1] : 0;
      const up = t > 0 ? accumulator[index - rhoBins] : 0;
      const down = t < THETA_STEPS - 1 ? accumulator[index + rhoBins] : 0;
      if (votes > left && votes >= right && votes > up && votes >= down) {
        lines.push({ rho: r - maxRho, theta: t * THETA_STEP, votes });
      }
    }
  }

  lines.sort((a, b) => b.votes - a.votes);
  return lines;
}

export function median(values: number[]): number {
  if (values.length === 0) {
    throw new RangeError('median of an empty list');
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Median angle (degrees) of detected lines relative to horizontal; null when
 * no line clears the vote threshold.
 */
export function estimateSkew(image: GrayImage, options: DeskewOptions = {}): number | null {
  const { lowThreshold, highThreshold, houghThreshold } = { ...DEFAULT_DESKEW_OPTIONS, ...options };
  const edges = detectEdges(image, lowThreshold, highThreshold);
  const lines = houghLines(edges, image.width, image.height, houghThreshold);
  if (lines.length === 0) return null;

  const angles = lines.map((line) => (line.theta * 180) / Math.PI - 90);
  return median(angles);
}

function cubicWeight(t: number): number {
  // Keys kernel with a = -0.5
  const a = -0.5;
  const x = Math.abs(t);
  if (x <= 1) return (a + 2) * x * x * x - (a + 3) * x * x + 1;
  if (x < 2) return a * x * x * x - 5 * a * x * x + 8 * a * x - 4 * a;
  return 0;
}

/**
 * Rotate content about the image centre so that lines at `angleDegrees`
 * become horizontal. Same canvas size; exposed area is filled with white;
 * bicubic sampling.
 */
export function rotateImage(image: GrayImage, angleDegrees: number, fill = 255): GrayImage {
  const { data, width, height } = image;
  const out = new Uint8Array(width * height);
  const radians = (angleDegrees * Math.PI) / 180;
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  const cx = (width - 1) / 2;
  const cy = (height - 1) / 2;

  const sample = (sx: number, sy: number): number => {
    if (sx < 0 || sy < 0 || sx >= width || sy >= height) return fill;
    return data[sy * width + sx];
  };

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const dx = x - cx;
      const dy = y - cy;
      const srcX = cx + cos * dx - sin * dy;
      const srcY = cy + sin * dx + cos * dy;

      if (srcX <= -1 || srcY <= -1 || srcX >= width || srcY >= height) {
        out[y * width + x] = fill;
        continue;
      }

      const x0 = Math.floor(srcX);
      const y0 = Math.floor(srcY);
      const fx = srcX - x0;
      const fy = srcY - y0;

      let value = 0;
      for (let m = -1; m <= 2; m++) {
        const wy = cubicWeight(m - fy);
        let row = 0;
        for (let n = -1; n <= 2; n++) {
          row += cubicWeight(n - fx) * sample(x0 + n, y0 + m);
        }
        value += wy * row;
      }
      out[y * width + x] = Math.min(255, Math.max(0, Math.round(value)));
    }
  }

  return { data: out, width, height };
}

/**
 * Estimate skew and rotate when it falls inside the correctable band.
 * Outside the band the input buffer is returned as-is.
 */
export function deskew(image: GrayImage, options: DeskewOptions = {}): DeskewResult {
  const resolved = { ...DEFAULT_DESKEW_OPTIONS, ...options };
  const angle = estimateSkew(image, resolved);

  if (angle === null) {
    return { image, angle: null, rotated: false, reason: 'no-lines' };
  }
  if (Math.abs(angle) > resolved.maxAngle) {
    return { image, angle, rotated: false, reason: 'above-maximum' };
  }
  if (Math.abs(angle) < resolved.minAngle) {
    return { image, angle, rotated: false, reason: 'below-minimum' };
  }

  return { image: rotateImage(image, angle), angle, rotated: true, reason: 'rotated' };
}
