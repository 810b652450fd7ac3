/**
 * Dense vectors: `vector` (float32 items) and `halfvec` (float16 items).
 *
 * Both kinds share one wire layout and differ only in item width:
 *
 * ```
 * ┌────────────┬─────────────────┬──────────────────────────────┐
 * │ u16 dim    │ u16 reserved=0  │ dim × big-endian float item  │
 * └────────────┴─────────────────┴──────────────────────────────┘
 * ```
 *
 * ## Usage
 *
 * ```typescript
 * import { Vector, HalfVector } from './dense-vector.js';
 *
 * const embedding = Vector.fromFloatList([0.25, -1.5, 3]);
 * const wire = embedding.toDatabaseBinary(); // 4 + 3 × 4 bytes
 * Vector.fromDatabaseBinary(wire).equals(embedding); // true
 *
 * HalfVector.fromFloatList([0.1]).toFloatList(); // [0.0999755859375]
 * ```
 *
 * @module codec/dense-vector
 */

import { inspect } from 'node:util';
import {
  FLOAT16_BYTES,
  FLOAT32_BYTES,
  asBuffer,
  packFloat16List,
  packFloat32List,
  packUInt16,
  readUInt16,
  unpackFloat16List,
  unpackFloat32List,
} from './byte-packing.js';
import { decodeFloatBase64, decodeFloatBase64Bytes } from './float-base64.js';
import { parseDenseText } from './text-format.js';
import type { VectorKind, VectorValue } from './types.js';
import { FormatError } from '../utils/errors.js';

export type DenseTypeName = 'vector' | 'halfvec';

/** Size of the `dim | reserved` header */
export const DENSE_HEADER_BYTES = 4;

interface DenseLayout {
  /** Name shown by toString() */
  label: string;
  cosineOps: string;
  bytesPerItem: number;
  pack(values: ArrayLike<number>): Buffer;
  unpack(data: Buffer): number[];
}

const DENSE_LAYOUTS: Record<DenseTypeName, DenseLayout> = {
  vector: {
    label: 'Vector',
    cosineOps: 'vector_cosine_ops',
    bytesPerItem: FLOAT32_BYTES,
    pack: packFloat32List,
    unpack: unpackFloat32List,
  },
  halfvec: {
    label: 'HalfVector',
    cosineOps: 'halfvec_cosine_ops',
    bytesPerItem: FLOAT16_BYTES,
    pack: packFloat16List,
    unpack: unpackFloat16List,
  },
};

/**
 * A dense vector holding its items as big-endian bytes.
 */
export class DenseVector<K extends DenseTypeName = DenseTypeName> implements VectorValue {
  readonly kind: K;
  private readonly data: Buffer;

  /**
   * @param data - Item bytes without the header; copied
   */
  constructor(kind: K, data: Uint8Array = Buffer.alloc(0)) {
    const { bytesPerItem } = DENSE_LAYOUTS[kind];
    if (data.length % bytesPerItem !== 0) {
      throw new FormatError(
        `${kind} item bytes must be a multiple of ${bytesPerItem}; got ${data.length}`,
        'MISALIGNED_BUFFER',
      );
    }
    this.kind = kind;
    this.data = Buffer.from(data);
  }

  bytesPerItem(): number {
    return DENSE_LAYOUTS[this.kind].bytesPerItem;
  }

  size(): number {
    return this.data.length / this.bytesPerItem();
  }

  /**
   * Copy of the item bytes, without the header.
   */
  toBytes(): Buffer {
    return Buffer.from(this.data);
  }

  toFloatList(): number[] {
    return DENSE_LAYOUTS[this.kind].unpack(this.data);
  }

  toDatabaseBinary(): Buffer {
    return Buffer.concat([packUInt16(this.size()), packUInt16(0), this.data]);
  }

  toPostgres(): Buffer {
    return this.toDatabaseBinary();
  }

  equals(other: unknown): boolean {
    return other instanceof DenseVector && other.kind === this.kind && other.data.equals(this.data);
  }

  toString(): string {
    return `${DENSE_LAYOUTS[this.kind].label}(dim=${this.size()})`;
  }

  toJSON(): number[] {
    return this.toFloatList();
  }

  /** Full form with every item byte, shown by console.log and util.inspect */
  [inspect.custom](): string {
    return `${DENSE_LAYOUTS[this.kind].label}(${this.data.toString('hex')})`;
  }
}

/**
 * Constructors of one dense kind.
 */
export interface DenseVectorKind<K extends DenseTypeName> extends VectorKind<DenseVector<K>> {
  readonly bytesPerItem: number;
  /** Wrap item bytes (no header) */
  fromBytes(data: Uint8Array): DenseVector<K>;
}

function createDenseKind<K extends DenseTypeName>(
  typeName: K,
  fromFloatBase64?: (text: string) => DenseVector<K>,
): DenseVectorKind<K> {
  const layout = DENSE_LAYOUTS[typeName];

  const fromFloatList = (values: ArrayLike<number>): DenseVector<K> =>
    new DenseVector(typeName, layout.pack(values));

  return {
    typeName,
    cosineOps: layout.cosineOps,
    bytesPerItem: layout.bytesPerItem,

    empty: () => new DenseVector(typeName),

    fromBytes: (data) => new DenseVector(typeName, data),

    fromFloatList,

    fromDatabaseBinary(input) {
      const data = asBuffer(input);
      if (data.length < DENSE_HEADER_BYTES) {
        throw new FormatError(
          `${typeName} header needs ${DENSE_HEADER_BYTES} bytes; got ${data.length}`,
          'TRUNCATED_HEADER',
        );
      }

      const size = readUInt16(data, 0);
      // bytes 2..3 are reserved and ignored on read
      if (data.length !== DENSE_HEADER_BYTES + layout.bytesPerItem * size) {
        throw new FormatError(
          `expected size: ${layout.bytesPerItem} * ${size}; got ${data.length - DENSE_HEADER_BYTES} bytes`,
          'LENGTH_MISMATCH',
        );
      }

      return new DenseVector(typeName, data.subarray(DENSE_HEADER_BYTES));
    },

    fromFloatBase64: fromFloatBase64 ?? ((text) => fromFloatList(decodeFloatBase64(text))),

    fromText: (text) => fromFloatList(parseDenseText(text)),

    isInstance: (value): value is DenseVector<K> =>
      value instanceof DenseVector && value.kind === typeName,
  };
}

/**
 * The `vector` type: single-precision items.
 *
 * Its item bytes already are big-endian float32, so base64 input is taken
 * as item bytes directly instead of being decoded to numbers and re-packed.
 */
export const Vector: DenseVectorKind<'vector'> = createDenseKind('vector', (text) => {
  return new DenseVector('vector', decodeFloatBase64Bytes(text));
});
export type Vector = DenseVector<'vector'>;

/** The `halfvec` type: half-precision items. */
export const HalfVector: DenseVectorKind<'halfvec'> = createDenseKind('halfvec');
export type HalfVector = DenseVector<'halfvec'>;
