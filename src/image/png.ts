import { PNG } from 'pngjs';
import { CHANNELS, type PixelGrid } from '../codec/index.js';

const RGBA_CHANNELS = 4;
const COLOR_TYPE_RGB = 2;
const COLOR_TYPE_RGBA = 6;

/**
 * The file parsed but is not an image the codec can read pixels from
 */
export class ImageFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImageFormatError';
  }
}

/**
 * Write the grid as an 8-bit RGB PNG
 */
export async function encodePng(grid: PixelGrid): Promise<Buffer> {
  const { width, height, data } = grid;
  const png = new PNG({ width, height, colorType: COLOR_TYPE_RGB, bitDepth: 8 });

  // pngjs stages pixels as RGBA; alpha is dropped when packing colour type 2
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const pixel = y * width + x;
      const src = pixel * CHANNELS;
      const dst = pixel * RGBA_CHANNELS;
      png.data[dst] = data[src];
      png.data[dst + 1] = data[src + 1];
      png.data[dst + 2] = data[src + 2];
      png.data[dst + 3] = 255;
    }
  }

  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    png.pack()
      .on('data', (chunk: Buffer) => chunks.push(chunk))
      .on('end', () => resolve(Buffer.concat(chunks)))
      .on('error', reject);
  });
}

function readPng(buffer: Buffer) {
  try {
    return PNG.sync.read(buffer);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ImageFormatError(`Not a readable PNG: ${reason}`);
  }
}

/**
 * Read an 8-bit RGB or RGBA PNG into a grid, discarding alpha
 */
export function decodePng(buffer: Buffer): PixelGrid {
  const png = readPng(buffer);

  if (png.depth !== 8) {
    throw new ImageFormatError(`Unsupported bit depth ${png.depth}, expected 8`);
  }
  if (png.colorType !== COLOR_TYPE_RGB && png.colorType !== COLOR_TYPE_RGBA) {
    throw new ImageFormatError(`Unsupported colour type ${png.colorType}, expected RGB or RGBA`);
  }

  const { width, height } = png;
  const data = new Uint8Array(width * height * CHANNELS);

  for (let pixel = 0; pixel < width * height; pixel++) {
    const src = pixel * RGBA_CHANNELS;
    const dst = pixel * CHANNELS;
    data[dst] = png.data[src];
    data[dst + 1] = png.data[src + 1];
    data[dst + 2] = png.data[src + 2];
  }

  return { width, height, data };
}
