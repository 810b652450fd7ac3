/**
 * Base64 text form of float32 sequences.
 *
 * The payload is the raw bytes of big-endian float32 values, 4 bytes each.
 * Big-endian matches the dense `vector` item layout, so the same text decodes
 * identically through `Vector.fromFloatBase64` and the generic path.
 */

import { FLOAT32_BYTES, packFloat32List, unpackFloat32List } from './byte-packing.js';
import { FormatError } from '../utils/errors.js';

/**
 * Decode base64 text to raw float32 bytes.
 */
export function decodeFloatBase64Bytes(text: string): Buffer {
  const bytes = Buffer.from(text, 'base64');
  if (bytes.length % FLOAT32_BYTES !== 0) {
    throw new FormatError(
      `base64 payload of ${bytes.length} bytes is not a whole number of float32 values`,
      'MISALIGNED_BUFFER',
    );
  }
  return bytes;
}

export function decodeFloatBase64(text: string): number[] {
  return unpackFloat32List(decodeFloatBase64Bytes(text));
}

export function encodeFloatBase64(values: ArrayLike<number>): string {
  return packFloat32List(values).toString('base64');
}
