import { encodeFrame, decodeFrame } from './frame.js';
import { solveDimensions, pixelsForBytes } from './dimensions.js';
import { packPixels, unpackPixels, type PixelGrid } from './pixels.js';

export { CodecError, isCodecError, type CodecErrorKind } from './errors.js';
export { FRAME_HEADER_BYTES, encodeFrame, decodeFrame, readDeclaredLength } from './frame.js';
export { solveDimensions, pixelsForBytes, planLayout, type Dimensions, type Layout } from './dimensions.js';
export { CHANNELS, packPixels, unpackPixels, pixelOffset, getPixel, type PixelGrid, type Rgb } from './pixels.js';

/**
 * Frame the payload and lay it out on the smallest near-square grid
 */
export function encodePayload(payload: Uint8Array): PixelGrid {
  const frame = encodeFrame(payload);
  const { width, height } = solveDimensions(pixelsForBytes(frame.length));
  return packPixels(frame, width, height);
}

/**
 * Recover the payload from a grid produced by encodePayload
 */
export function decodePixels(grid: PixelGrid): Uint8Array {
  return decodeFrame(unpackPixels(grid));
}
