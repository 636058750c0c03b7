/**
 * Conversion between encoded image files and raw DocumentImage buffers.
 */

import sharp from 'sharp';
import type { ChannelCount, DocumentImage } from '../../types/document.js';
import { BadRequestError } from '../../types/errors.js';

function toChannelCount(channels: number): ChannelCount {
  if (channels === 1 || channels === 3 || channels === 4) {
    return channels;
  }
  throw new BadRequestError(`Unsupported channel count: ${channels}`, { channels });
}

/**
 * Decode a file path or encoded buffer (PNG, JPEG, TIFF, WebP…) to RGB pixels.
 * EXIF orientation is applied so camera photos come out upright.
 */
export async function decodeImage(input: string | Buffer): Promise<DocumentImage> {
  const { data, info } = await sharp(input)
    .rotate()
    .removeAlpha()
    .toColourspace('srgb')
    .raw()
    .toBuffer({ resolveWithObject: true });

  return {
    data: new Uint8Array(data),
    width: info.width,
    height: info.height,
    channels: toChannelCount(info.channels),
  };
}

/**
 * Encode raw pixels as PNG (the format handed to the OCR engine and written to disk).
 */
export async function encodePng(image: DocumentImage): Promise<Buffer> {
  return sharp(Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength), {
    raw: { width: image.width, height: image.height, channels: image.channels },
  })
    .png()
    .toBuffer();
}
