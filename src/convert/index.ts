import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import {
  encodePayload,
  decodePixels,
  unpackPixels,
  readDeclaredLength,
  planLayout,
  isCodecError,
  FRAME_HEADER_BYTES,
  type Layout,
  type PixelGrid,
} from '../codec/index.js';
import { encodePng, decodePng, ImageFormatError } from '../image/index.js';
import { succeed, fail, errorMessage, type ConvertResult } from './result.js';

export * from './result.js';

export interface WriteOptions {
  overwrite?: boolean;
}

export interface EncodeSummary {
  inputPath: string;
  outputPath: string;
  payloadBytes: number;
  imageBytes: number;
  layout: Layout;
}

export interface DecodeSummary {
  imagePath: string;
  outputPath: string;
  width: number;
  height: number;
  payloadBytes: number;
}

export type ImageStatus = 'ok' | 'truncated-header' | 'truncated-payload';

export interface ImageReport {
  imagePath: string;
  width: number;
  height: number;
  capacity: number;
  /** Decimal string; the header is a u64 and may exceed Number.MAX_SAFE_INTEGER */
  declaredLength: string | null;
  status: ImageStatus;
  padding: number | null;
}

async function readSource(filePath: string): Promise<ConvertResult<Buffer>> {
  try {
    return succeed(await fs.readFile(filePath));
  } catch (error) {
    return fail('SourceUnavailable', filePath, `Cannot read ${filePath}: ${errorMessage(error)}`);
  }
}

async function readImage(imagePath: string): Promise<ConvertResult<PixelGrid>> {
  const source = await readSource(imagePath);
  if (!source.ok) return source;

  try {
    return succeed(decodePng(source.value));
  } catch (error) {
    if (error instanceof ImageFormatError) {
      return fail('InvalidImage', imagePath, error.message);
    }
    throw error;
  }
}

function tempSibling(outputPath: string): string {
  const suffix = crypto.randomBytes(6).toString('hex');
  return path.join(path.dirname(outputPath), `.${path.basename(outputPath)}.${suffix}.tmp`);
}

/**
 * Write a fully built buffer to a temporary sibling, then move it into
 * place. The destination is either untouched or complete. Without
 * overwrite an existing destination is left untouched.
 */
async function writeOutput(
  outputPath: string,
  data: Uint8Array,
  options: WriteOptions
): Promise<ConvertResult<void>> {
  const tempPath = tempSibling(outputPath);
  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(tempPath, data, { flag: 'wx' });
    if (options.overwrite) {
      await fs.rename(tempPath, outputPath);
    } else {
      // link fails with EEXIST instead of replacing
      await fs.link(tempPath, outputPath);
    }
    return succeed(undefined);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      return fail('DestinationExists', outputPath, `${outputPath} already exists`);
    }
    return fail('WriteFailed', outputPath, `Cannot write ${outputPath}: ${errorMessage(error)}`);
  } finally {
    await fs.rm(tempPath, { force: true });
  }
}

/**
 * Hide the bytes of inputPath in a PNG written to outputPath
 */
export async function fileToImage(
  inputPath: string,
  outputPath: string,
  options: WriteOptions = {}
): Promise<ConvertResult<EncodeSummary>> {
  const source = await readSource(inputPath);
  if (!source.ok) return source;

  const payload = source.value;
  const grid = encodePayload(payload);
  const png = await encodePng(grid);

  const written = await writeOutput(outputPath, png, options);
  if (!written.ok) return written;

  return succeed({
    inputPath,
    outputPath,
    payloadBytes: payload.length,
    imageBytes: png.length,
    layout: planLayout(payload.length),
  });
}

/**
 * Recover the original file from a PNG produced by fileToImage
 */
export async function imageToFile(
  imagePath: string,
  outputPath: string,
  options: WriteOptions = {}
): Promise<ConvertResult<DecodeSummary>> {
  const image = await readImage(imagePath);
  if (!image.ok) return image;

  const grid = image.value;
  let payload: Uint8Array;
  try {
    payload = decodePixels(grid);
  } catch (error) {
    if (isCodecError(error) && error.kind !== 'CapacityExceeded') {
      return fail(error.kind, imagePath, error.message);
    }
    throw error;
  }

  const written = await writeOutput(outputPath, payload, options);
  if (!written.ok) return written;

  return succeed({
    imagePath,
    outputPath,
    width: grid.width,
    height: grid.height,
    payloadBytes: payload.length,
  });
}

/**
 * Report what a PNG claims to carry without writing anything
 */
export async function inspectImage(imagePath: string): Promise<ConvertResult<ImageReport>> {
  const image = await readImage(imagePath);
  if (!image.ok) return image;

  const { width, height } = image.value;
  const bytes = unpackPixels(image.value);
  const report: ImageReport = {
    imagePath,
    width,
    height,
    capacity: bytes.length,
    declaredLength: null,
    status: 'truncated-header',
    padding: null,
  };

  if (bytes.length < FRAME_HEADER_BYTES) {
    return succeed(report);
  }

  const declared = readDeclaredLength(bytes);
  const available = BigInt(bytes.length - FRAME_HEADER_BYTES);
  report.declaredLength = declared.toString();

  if (declared > available) {
    report.status = 'truncated-payload';
    return succeed(report);
  }

  report.status = 'ok';
  report.padding = Number(available - declared);
  return succeed(report);
}
