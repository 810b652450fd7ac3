/**
 * Sparse vectors: the `sparsevec` type.
 *
 * Only non-zero positions are stored, as (index, value) pairs:
 *
 * ```
 * ┌─────────┬─────────┬────────────────┬──────────────────┬──────────────────┐
 * │ i32 dim │ i32 nnz │ i32 reserved=0 │ nnz × i32 index  │ nnz × f32 value  │
 * └─────────┴─────────┴────────────────┴──────────────────┴──────────────────┘
 * ```
 *
 * All fields are big-endian. Indices are zero-based.
 *
 * @module codec/sparse-vector
 */

import { inspect } from 'node:util';
import {
  FLOAT32_BYTES,
  INT32_BYTES,
  asBuffer,
  packFloat32List,
  packInt32,
  packInt32List,
  readInt32,
  unpackFloat32List,
  unpackInt32List,
} from './byte-packing.js';
import { decodeFloatBase64 } from './float-base64.js';
import { parseSparseText } from './text-format.js';
import type { VectorValue } from './types.js';
import { FormatError } from '../utils/errors.js';

/** Size of the `dim | nnz | reserved` header */
export const SPARSE_HEADER_BYTES = 12;

/** Largest dimension count the server accepts for sparsevec */
export const SPARSEVEC_MAX_DIM = 1_000_000_000;

/**
 * A sparse vector of single-precision values.
 *
 * The class itself satisfies `VectorKind<SparseVector>` through its static members.
 */
export class SparseVector implements VectorValue {
  static readonly typeName = 'sparsevec' as const;
  static readonly cosineOps = 'sparsevec_cosine_ops';

  readonly kind = 'sparsevec' as const;
  private readonly dimensions: number;
  private readonly indices: Buffer;
  private readonly values: Buffer;

  /**
   * With no arguments, builds the empty vector.
   *
   * @param indices - Big-endian int32 indices; copied
   * @param values - Big-endian float32 values; copied
   */
  constructor(
    dimensions: number = 0,
    indices: Uint8Array = Buffer.alloc(0),
    values: Uint8Array = Buffer.alloc(0),
  ) {
    if (!Number.isInteger(dimensions) || dimensions < 0 || dimensions > SPARSEVEC_MAX_DIM) {
      throw new FormatError(`invalid sparse dimensions: ${dimensions}`, 'FIELD_OUT_OF_RANGE');
    }
    if (indices.length % INT32_BYTES !== 0 || values.length % FLOAT32_BYTES !== 0) {
      throw new FormatError(
        `sparse buffers must be multiples of 4 bytes; got ${indices.length} and ${values.length}`,
        'MISALIGNED_BUFFER',
      );
    }
    if (indices.length / INT32_BYTES !== values.length / FLOAT32_BYTES) {
      throw new FormatError(
        `indices describe ${indices.length / INT32_BYTES} entries but values describe ${values.length / FLOAT32_BYTES}`,
        'NNZ_MISMATCH',
      );
    }

    this.dimensions = dimensions;
    this.indices = Buffer.from(indices);
    this.values = Buffer.from(values);
  }

  static empty(): SparseVector {
    return new SparseVector();
  }

  /**
   * Keep every position whose value is not exactly zero.
   */
  static fromFloatList(list: ArrayLike<number>): SparseVector {
    const indices: number[] = [];
    const values: number[] = [];
    for (let i = 0; i < list.length; i++) {
      if (list[i] !== 0) {
        indices.push(i);
        values.push(list[i]);
      }
    }
    return new SparseVector(list.length, packInt32List(indices), packFloat32List(values));
  }

  static fromDatabaseBinary(input: Uint8Array): SparseVector {
    const data = asBuffer(input);
    if (data.length < SPARSE_HEADER_BYTES) {
      throw new FormatError(
        `sparsevec header needs ${SPARSE_HEADER_BYTES} bytes; got ${data.length}`,
        'TRUNCATED_HEADER',
      );
    }

    const dimensions = readInt32(data, 0);
    const nnz = readInt32(data, 4);
    // bytes 8..11 are reserved and ignored on read
    if (dimensions < 0 || nnz < 0) {
      throw new FormatError(
        `negative sparsevec header field: dim=${dimensions}, nnz=${nnz}`,
        'FIELD_OUT_OF_RANGE',
      );
    }

    const expected = SPARSE_HEADER_BYTES + (INT32_BYTES + FLOAT32_BYTES) * nnz;
    if (data.length !== expected) {
      throw new FormatError(
        `expected ${expected} bytes for nnz=${nnz}; got ${data.length}`,
        'LENGTH_MISMATCH',
      );
    }

    const valuesStart = SPARSE_HEADER_BYTES + INT32_BYTES * nnz;
    return new SparseVector(
      dimensions,
      data.subarray(SPARSE_HEADER_BYTES, valuesStart),
      data.subarray(valuesStart),
    );
  }

  static fromFloatBase64(text: string): SparseVector {
    return SparseVector.fromFloatList(decodeFloatBase64(text));
  }

  static fromText(text: string): SparseVector {
    const { dimensions, indices, values } = parseSparseText(text);
    return new SparseVector(dimensions, packInt32List(indices), packFloat32List(values));
  }

  static isInstance(value: unknown): value is SparseVector {
    return value instanceof SparseVector;
  }

  size(): number {
    return this.dimensions;
  }

  /** Number of stored entries */
  nnz(): number {
    return this.indices.length / INT32_BYTES;
  }

  indexList(): number[] {
    return unpackInt32List(this.indices);
  }

  valueList(): number[] {
    return unpackFloat32List(this.values);
  }

  /**
   * Expand to a dense list. Repeated indices are not rejected; the last one wins.
   * Allocates `size()` entries, at most SPARSEVEC_MAX_DIM.
   */
  toFloatList(): number[] {
    const result = new Array<number>(this.dimensions).fill(0);
    const indices = this.indexList();
    const values = this.valueList();

    for (let i = 0; i < indices.length; i++) {
      const index = indices[i];
      if (index < 0 || index >= this.dimensions) {
        throw new FormatError(
          `sparse index ${index} outside [0, ${this.dimensions})`,
          'INDEX_OUT_OF_RANGE',
        );
      }
      result[index] = values[i];
    }

    return result;
  }

  toDatabaseBinary(): Buffer {
    return Buffer.concat([
      packInt32(this.dimensions),
      packInt32(this.nnz()),
      packInt32(0),
      this.indices,
      this.values,
    ]);
  }

  toPostgres(): Buffer {
    return this.toDatabaseBinary();
  }

  equals(other: unknown): boolean {
    return (
      other instanceof SparseVector &&
      other.dimensions === this.dimensions &&
      other.indices.equals(this.indices) &&
      other.values.equals(this.values)
    );
  }

  toString(): string {
    return `SparseVector(dim=${this.dimensions}, nnz=${this.nnz()})`;
  }

  toJSON(): number[] {
    return this.toFloatList();
  }

  /** Full form with every stored byte, shown by console.log and util.inspect */
  [inspect.custom](): string {
    return (
      `SparseVector(dim=${this.dimensions}, ` +
      `indices=${this.indices.toString('hex')}, values=${this.values.toString('hex')})`
    );
  }
}
