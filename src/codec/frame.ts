import { CodecError } from './errors.js';

/** Size of the big-endian u64 length prefix */
export const FRAME_HEADER_BYTES = 8;

/**
 * Prefix the payload with its length as an unsigned 64-bit big-endian integer
 */
export function encodeFrame(payload: Uint8Array): Uint8Array {
  const frame = new Uint8Array(FRAME_HEADER_BYTES + payload.length);
  new DataView(frame.buffer).setBigUint64(0, BigInt(payload.length), false);
  frame.set(payload, FRAME_HEADER_BYTES);
  return frame;
}

/**
 * Read the length recorded in the frame header without touching the payload
 */
export function readDeclaredLength(bytes: Uint8Array): bigint {
  if (bytes.length < FRAME_HEADER_BYTES) {
    throw new CodecError(
      'TruncatedHeader',
      `Frame header needs ${FRAME_HEADER_BYTES} bytes, only ${bytes.length} available`
    );
  }

  return new DataView(bytes.buffer, bytes.byteOffset, FRAME_HEADER_BYTES).getBigUint64(0, false);
}

/**
 * Extract exactly the declared number of payload bytes.
 * Anything after the payload is padding and is ignored.
 */
export function decodeFrame(bytes: Uint8Array): Uint8Array {
  const declared = readDeclaredLength(bytes);
  const available = BigInt(bytes.length - FRAME_HEADER_BYTES);

  if (declared > available) {
    throw new CodecError(
      'TruncatedPayload',
      `Frame declares ${declared} payload bytes, only ${available} available`
    );
  }

  const end = FRAME_HEADER_BYTES + Number(declared);
  return bytes.slice(FRAME_HEADER_BYTES, end);
}
