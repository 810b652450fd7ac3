/**
 * Big-endian packing of the fixed-width fields used by the vector wire formats.
 *
 * Every multi-byte field is big-endian regardless of host byte order.
 * Float narrowing never produces an infinity from a finite input: values
 * that overflow the target width throw a FormatError instead.
 *
 * @module codec/byte-packing
 */

import { FormatError } from '../utils/errors.js';

/** Bytes in an IEEE-754 single-precision float */
export const FLOAT32_BYTES = 4;

/** Bytes in an IEEE-754 half-precision float */
export const FLOAT16_BYTES = 2;

/** Bytes in a signed 32-bit integer */
export const INT32_BYTES = 4;

/** Bytes in an unsigned 16-bit integer */
export const UINT16_BYTES = 2;

/** Largest finite half-precision value */
export const FLOAT16_MAX = 65504;

const FLOAT16_MIN_NORMAL = 2 ** -14;
const FLOAT16_SUBNORMAL_UNIT = 2 ** -24;

export const INT32_MIN = -(2 ** 31);
export const INT32_MAX = 2 ** 31 - 1;
export const UINT16_MAX = 0xffff;

/**
 * View any byte array as a Buffer without copying.
 */
export function asBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

// ─────────────────────────────────────────────────────────────────────────────
// Integer fields
// ─────────────────────────────────────────────────────────────────────────────

function assertIntegerInRange(value: number, min: number, max: number, field: string): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new FormatError(
      `${field} value ${value} does not fit in range [${min}, ${max}]`,
      'FIELD_OUT_OF_RANGE',
    );
  }
}

function assertReadable(data: Uint8Array, offset: number, width: number): void {
  if (offset < 0 || offset + width > data.length) {
    throw new FormatError(
      `cannot read ${width} bytes at offset ${offset} from a ${data.length}-byte buffer`,
      'TRUNCATED_HEADER',
    );
  }
}

function assertAligned(data: Uint8Array, width: number): void {
  if (data.length % width !== 0) {
    throw new FormatError(
      `buffer length ${data.length} is not a multiple of ${width}`,
      'MISALIGNED_BUFFER',
    );
  }
}

export function packUInt16(value: number): Buffer {
  assertIntegerInRange(value, 0, UINT16_MAX, 'uint16');
  const buf = Buffer.alloc(UINT16_BYTES);
  buf.writeUInt16BE(value, 0);
  return buf;
}

export function readUInt16(data: Buffer, offset: number): number {
  assertReadable(data, offset, UINT16_BYTES);
  return data.readUInt16BE(offset);
}

export function packInt32(value: number): Buffer {
  assertIntegerInRange(value, INT32_MIN, INT32_MAX, 'int32');
  const buf = Buffer.alloc(INT32_BYTES);
  buf.writeInt32BE(value, 0);
  return buf;
}

export function readInt32(data: Buffer, offset: number): number {
  assertReadable(data, offset, INT32_BYTES);
  return data.readInt32BE(offset);
}

/**
 * Pack a sequence of signed 32-bit integers.
 */
export function packInt32List(values: ArrayLike<number>): Buffer {
  const buf = Buffer.alloc(values.length * INT32_BYTES);
  for (let i = 0; i < values.length; i++) {
    assertIntegerInRange(values[i], INT32_MIN, INT32_MAX, 'int32');
    buf.writeInt32BE(values[i], i * INT32_BYTES);
  }
  return buf;
}

export function unpackInt32List(data: Buffer): number[] {
  assertAligned(data, INT32_BYTES);
  const result = new Array<number>(data.length / INT32_BYTES);
  for (let i = 0; i < result.length; i++) {
    result[i] = data.readInt32BE(i * INT32_BYTES);
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────
// Single precision
// ─────────────────────────────────────────────────────────────────────────────

function assertFitsFloat32(value: number): void {
  if (Number.isFinite(value) && !Number.isFinite(Math.fround(value))) {
    throw new FormatError(`${value} is too large for single precision`, 'VALUE_OUT_OF_RANGE');
  }
}

/**
 * Pack doubles as big-endian single-precision floats.
 */
export function packFloat32List(values: ArrayLike<number>): Buffer {
  const buf = Buffer.alloc(values.length * FLOAT32_BYTES);
  for (let i = 0; i < values.length; i++) {
    assertFitsFloat32(values[i]);
    buf.writeFloatBE(values[i], i * FLOAT32_BYTES);
  }
  return buf;
}

/**
 * Unpack big-endian single-precision floats, widened to double.
 */
export function unpackFloat32List(data: Buffer): number[] {
  assertAligned(data, FLOAT32_BYTES);
  const result = new Array<number>(data.length / FLOAT32_BYTES);
  for (let i = 0; i < result.length; i++) {
    result[i] = data.readFloatBE(i * FLOAT32_BYTES);
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────
// Half precision
// ─────────────────────────────────────────────────────────────────────────────

function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Convert a double to IEEE-754 binary16 bits with a single round-half-to-even step.
 */
export function toFloat16Bits(value: number): number {
  if (Number.isNaN(value)) return 0x7e00;

  const sign = value < 0 || Object.is(value, -0) ? 0x8000 : 0;
  const abs = Math.abs(value);
  if (abs === Infinity) return sign | 0x7c00;

  if (abs < FLOAT16_MIN_NORMAL) {
    // Rounding up to 1024 lands exactly on the smallest normal encoding
    return sign | roundHalfEven(abs / FLOAT16_SUBNORMAL_UNIT);
  }

  // Math.log2 can be off by one ulp near powers of two
  let exponent = Math.floor(Math.log2(abs));
  if (2 ** exponent > abs) {
    exponent -= 1;
  } else if (2 ** (exponent + 1) <= abs) {
    exponent += 1;
  }

  let mantissa = roundHalfEven((abs / 2 ** exponent - 1) * 1024);
  if (mantissa === 1024) {
    mantissa = 0;
    exponent += 1;
  }
  if (exponent > 15) {
    throw new FormatError(`${value} is too large for half precision`, 'VALUE_OUT_OF_RANGE');
  }

  return sign | ((exponent + 15) << 10) | mantissa;
}

/**
 * Widen IEEE-754 binary16 bits to a double.
 */
export function fromFloat16Bits(bits: number): number {
  const sign = bits & 0x8000 ? -1 : 1;
  const exponent = (bits >> 10) & 0x1f;
  const fraction = bits & 0x3ff;

  if (exponent === 0) return sign * fraction * FLOAT16_SUBNORMAL_UNIT;
  if (exponent === 0x1f) return fraction === 0 ? sign * Infinity : NaN;
  return sign * (1 + fraction / 1024) * 2 ** (exponent - 15);
}

/**
 * Pack doubles as big-endian half-precision floats.
 */
export function packFloat16List(values: ArrayLike<number>): Buffer {
  const buf = Buffer.alloc(values.length * FLOAT16_BYTES);
  for (let i = 0; i < values.length; i++) {
    buf.writeUInt16BE(toFloat16Bits(values[i]), i * FLOAT16_BYTES);
  }
  return buf;
}

/**
 * Unpack big-endian half-precision floats, widened to double.
 */
export function unpackFloat16List(data: Buffer): number[] {
  assertAligned(data, FLOAT16_BYTES);
  const result = new Array<number>(data.length / FLOAT16_BYTES);
  for (let i = 0; i < result.length; i++) {
    result[i] = fromFloat16Bits(data.readUInt16BE(i * FLOAT16_BYTES));
  }
  return result;
}

/**
 * Round a double to the nearest half-precision value.
 */
export function roundToFloat16(value: number): number {
  return fromFloat16Bits(toFloat16Bits(value));
}
