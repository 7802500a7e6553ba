import { FRAME_HEADER_BYTES } from './frame.js';
import { CHANNELS } from './pixels.js';

export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Everything the encoder decides for a payload of a given length
 */
export interface Layout extends Dimensions {
  frameLength: number;
  minPixels: number;
  capacity: number;
  padding: number;
}

/**
 * Largest integer whose square does not exceed n
 */
function integerSqrt(n: number): number {
  let root = Math.floor(Math.sqrt(n));
  // Math.sqrt can land one off for large inputs
  while (root * root > n) root--;
  while ((root + 1) * (root + 1) <= n) root++;
  return root;
}

/**
 * Pick the most square rectangle whose area is exactly max(minPixels, 1).
 *
 * Width is the largest divisor of the area not above its square root, so
 * width <= height. A prime area falls back to a single column.
 */
export function solveDimensions(minPixels: number): Dimensions {
  if (!Number.isSafeInteger(minPixels) || minPixels < 0) {
    throw new RangeError(`Pixel count must be a non-negative integer, got ${minPixels}`);
  }

  const area = Math.max(minPixels, 1);
  let width = integerSqrt(area);
  while (area % width !== 0) {
    width--;
  }

  return { width, height: area / width };
}

/**
 * Number of RGB pixels needed to hold byteCount bytes
 */
export function pixelsForBytes(byteCount: number): number {
  return Math.ceil(byteCount / CHANNELS);
}

export function planLayout(payloadLength: number): Layout {
  if (!Number.isSafeInteger(payloadLength) || payloadLength < 0) {
    throw new RangeError(`Payload length must be a non-negative integer, got ${payloadLength}`);
  }

  const frameLength = FRAME_HEADER_BYTES + payloadLength;
  const minPixels = pixelsForBytes(frameLength);
  const { width, height } = solveDimensions(minPixels);
  const capacity = width * height * CHANNELS;

  return {
    frameLength,
    minPixels,
    width,
    height,
    capacity,
    padding: capacity - frameLength,
  };
}
