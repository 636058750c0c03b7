/**
 * Channel conversion between DocumentImage and the single-channel working image.
 */

import type { ChannelCount, DocumentImage, GrayImage } from '../../types/document.js';

function assertBufferSize(data: Uint8Array, width: number, height: number, channels: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new RangeError(`Invalid image dimensions ${width}x${height}`);
  }
  if (data.length < width * height * channels) {
    throw new RangeError(
      `Pixel buffer too small: expected ${width * height * channels} bytes, got ${data.length}`
    );
  }
}

/**
 * Reduce to one channel with Rec.601 luma weights. Alpha is ignored.
 */
export function toGrayscale(image: DocumentImage): GrayImage {
  const { data, width, height, channels } = image;
  assertBufferSize(data, width, height, channels);

  const pixelCount = width * height;
  const out = new Uint8Array(pixelCount);

  if (channels === 1) {
    out.set(data.subarray(0, pixelCount));
    return { data: out, width, height };
  }

  for (let i = 0, src = 0; i < pixelCount; i++, src += channels) {
    out[i] = Math.round(0.299 * data[src] + 0.587 * data[src + 1] + 0.114 * data[src + 2]);
  }
  return { data: out, width, height };
}

/**
 * Replicate a gray image into three channels.
 */
export function grayToRgb(gray: GrayImage): DocumentImage {
  const { data, width, height } = gray;
  assertBufferSize(data, width, height, 1);

  const pixelCount = width * height;
  const out = new Uint8Array(pixelCount * 3);
  for (let i = 0, dst = 0; i < pixelCount; i++, dst += 3) {
    const v = data[i];
    out[dst] = v;
    out[dst + 1] = v;
    out[dst + 2] = v;
  }
  return { data: out, width, height, channels: 3 };
}

/**
 * Bring any DocumentImage to three channels (copying, never aliasing the input).
 */
export function toRgb(image: DocumentImage): DocumentImage {
  const { data, width, height, channels } = image;
  if (channels === 1) {
    return grayToRgb({ data, width, height });
  }

  assertBufferSize(data, width, height, channels);
  const pixelCount = width * height;
  const out = new Uint8Array(pixelCount * 3);
  for (let i = 0, src = 0, dst = 0; i < pixelCount; i++, src += channels, dst += 3) {
    out[dst] = data[src];
    out[dst + 1] = data[src + 1];
    out[dst + 2] = data[src + 2];
  }
  return { data: out, width, height, channels: 3 };
}

/**
 * White canvas of the given size. Dimensions that are not non-negative
 * integers are coerced so this never throws.
 */
export function createBlankImage(width: number, height: number, channels: ChannelCount = 3): DocumentImage {
  const w = Number.isFinite(width) ? Math.max(0, Math.floor(width)) : 0;
  const h = Number.isFinite(height) ? Math.max(0, Math.floor(height)) : 0;
  return { data: new Uint8Array(w * h * channels).fill(255), width: w, height: h, channels };
}
