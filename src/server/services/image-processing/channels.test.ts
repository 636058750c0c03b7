import { describe, it, expect } from 'vitest';
import { createBlankImage, grayToRgb, toGrayscale, toRgb } from './channels.js';

describe('channels', () => {
  it('reduces RGB with Rec.601 weights', () => {
    const gray = toGrayscale({ data: new Uint8Array([255, 0, 0, 0, 255, 0, 0, 0, 255]), width: 3, height: 1, channels: 3 });
    expect(Array.from(gray.data)).toEqual([76, 150, 29]);
  });

  it('ignores alpha', () => {
    const gray = toGrayscale({ data: new Uint8Array([100, 100, 100, 0]), width: 1, height: 1, channels: 4 });
    expect(gray.data[0]).toBe(100);
  });

  it('copies single-channel input instead of aliasing it', () => {
    const data = new Uint8Array([1, 2, 3, 4]);
    const gray = toGrayscale({ data, width: 2, height: 2, channels: 1 });
    gray.data[0] = 99;
    expect(data[0]).toBe(1);
  });

  it('rejects a buffer smaller than its dimensions', () => {
    expect(() => toGrayscale({ data: new Uint8Array(5), width: 2, height: 2, channels: 3 })).toThrow(RangeError);
  });

  it('replicates gray into three channels', () => {
    const rgb = grayToRgb({ data: new Uint8Array([7, 9]), width: 2, height: 1 });
    expect(rgb.channels).toBe(3);
    expect(Array.from(rgb.data)).toEqual([7, 7, 7, 9, 9, 9]);
  });

  it('drops alpha when converting RGBA to RGB', () => {
    const rgb = toRgb({ data: new Uint8Array([1, 2, 3, 4]), width: 1, height: 1, channels: 4 });
    expect(Array.from(rgb.data)).toEqual([1, 2, 3]);
  });

  it('creates a white canvas and coerces bad dimensions', () => {
    const blank = createBlankImage(2, 1);
    expect(Array.from(blank.data)).toEqual([255, 255, 255, 255, 255, 255]);
    expect(createBlankImage(Number.NaN, -3).data.length).toBe(0);
  });
});
