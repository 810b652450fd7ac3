/**
 * Encode/decode hooks handed to a database client for each vector kind.
 *
 * The client only knows "bytes or null". Values arriving from application
 * code are first translated into a tagged `CodecInput`, so the encoder itself
 * never guesses at runtime shapes:
 *
 * ```
 *   unknown ──toCodecInput──► CodecInput ──encodeCodecInput──► Buffer | null
 *   Buffer | null ──────────decodeCodecInput──────────────────► V | null
 *   string ─────────────────kind.fromText─────────────────────► V
 * ```
 *
 * `null` stands for SQL NULL in both directions and passes through untouched.
 * Result columns arrive from `pg` as text, hence the separate `parse` hook.
 *
 * @module adapter/codec-adapter
 */

import { isVectorValue } from '../codec/registry.js';
import type { VectorKind, VectorValue } from '../codec/types.js';
import { VectorTypeError, describeType } from '../utils/errors.js';

/**
 * A column value as the encoder sees it.
 */
export type CodecInput =
  | { type: 'vector'; value: VectorValue }
  | { type: 'floats'; values: ArrayLike<number> }
  | { type: 'absent' };

/**
 * The pair of hooks registered for one PostgreSQL type.
 */
export interface VectorCodec<V extends VectorValue = VectorValue> {
  readonly typeName: V['kind'];
  encode(value: unknown): Buffer | null;
  decode(data: Uint8Array | null): V | null;
  /** Parse the type's text output */
  parse(text: string): V;
}

/**
 * Translate an untyped value into a CodecInput.
 *
 * JavaScript numbers are all doubles, so every number counts as a float;
 * `bigint` (the integer type) and other item types are rejected by name.
 */
export function toCodecInput(value: unknown): CodecInput {
  if (value === null || value === undefined) {
    return { type: 'absent' };
  }

  if (isVectorValue(value)) {
    return { type: 'vector', value };
  }

  if (value instanceof Float32Array || value instanceof Float64Array) {
    return { type: 'floats', values: value };
  }

  if (Array.isArray(value)) {
    const values: number[] = [];
    for (let i = 0; i < value.length; i++) {
      const item: unknown = value[i];
      if (typeof item !== 'number') {
        throw new VectorTypeError(
          `unsupported list item type at index ${i}: ${describeType(item)}`,
          'UNSUPPORTED_ITEM_TYPE',
        );
      }
      values.push(item);
    }
    return { type: 'floats', values };
  }

  throw new VectorTypeError(`unsupported type: ${describeType(value)}`, 'UNSUPPORTED_TYPE');
}

/**
 * Produce the wire bytes for a column value, or null for SQL NULL.
 */
export function encodeCodecInput<V extends VectorValue>(
  kind: VectorKind<V>,
  input: CodecInput,
): Buffer | null {
  switch (input.type) {
    case 'absent':
      return null;

    case 'vector':
      if (input.value.kind !== kind.typeName) {
        throw new VectorTypeError(
          `cannot encode a ${input.value.kind} value as ${kind.typeName}`,
          'KIND_MISMATCH',
        );
      }
      return input.value.toDatabaseBinary();

    case 'floats': {
      const vector = input.values.length > 0 ? kind.fromFloatList(input.values) : kind.empty();
      return vector.toDatabaseBinary();
    }

    default: {
      const unreachable: never = input;
      throw new VectorTypeError(
        `unsupported input: ${describeType(unreachable)}`,
        'UNSUPPORTED_TYPE',
      );
    }
  }
}

/**
 * Build a vector from wire bytes; null passes through.
 */
export function decodeCodecInput<V extends VectorValue>(
  kind: VectorKind<V>,
  data: Uint8Array | null,
): V | null {
  if (data === null) {
    return null;
  }
  return kind.fromDatabaseBinary(data);
}

/**
 * Bundle the hooks for one vector kind.
 */
export function createVectorCodec<V extends VectorValue>(kind: VectorKind<V>): VectorCodec<V> {
  return {
    typeName: kind.typeName,
    encode: (value) => encodeCodecInput(kind, toCodecInput(value)),
    decode: (data) => decodeCodecInput(kind, data),
    parse: (text) => kind.fromText(text),
  };
}
