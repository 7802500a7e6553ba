import { CodecError } from './errors.js';

/** Bytes per pixel: R, G, B */
export const CHANNELS = 3;

/**
 * Row-major RGB pixels. Pixel (x, y) starts at pixelOffset(x, y, width).
 */
export interface PixelGrid {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

export type Rgb = readonly [r: number, g: number, b: number];

function assertDimension(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new RangeError(`Image ${name} must be a positive integer, got ${value}`);
  }
}

export function pixelOffset(x: number, y: number, width: number): number {
  return (y * width + x) * CHANNELS;
}

/**
 * Copy the frame into a zeroed width x height grid
 */
export function packPixels(frame: Uint8Array, width: number, height: number): PixelGrid {
  assertDimension('width', width);
  assertDimension('height', height);

  const capacity = width * height * CHANNELS;
  if (frame.length > capacity) {
    throw new CodecError(
      'CapacityExceeded',
      `${frame.length} bytes do not fit in a ${width}x${height} grid (${capacity} bytes)`
    );
  }

  const data = new Uint8Array(capacity);
  data.set(frame, 0);

  return { width, height, data };
}

/**
 * Flatten the grid back into bytes, padding included
 */
export function unpackPixels(grid: PixelGrid): Uint8Array {
  assertDimension('width', grid.width);
  assertDimension('height', grid.height);

  const expected = grid.width * grid.height * CHANNELS;
  if (grid.data.length !== expected) {
    throw new RangeError(
      `Pixel data holds ${grid.data.length} bytes, a ${grid.width}x${grid.height} grid needs ${expected}`
    );
  }

  return grid.data.slice(0, expected);
}

export function getPixel(grid: PixelGrid, x: number, y: number): Rgb {
  if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= grid.width || y >= grid.height) {
    throw new RangeError(`Pixel (${x}, ${y}) is outside a ${grid.width}x${grid.height} grid`);
  }

  const offset = pixelOffset(x, y, grid.width);
  return [grid.data[offset], grid.data[offset + 1], grid.data[offset + 2]];
}
