/**
 * Shared capability set of the vector kinds.
 */

/** PostgreSQL type names of the supported vector kinds */
export type VectorTypeName = 'vector' | 'halfvec' | 'sparsevec';

export const VECTOR_TYPE_NAMES: readonly VectorTypeName[] = ['vector', 'halfvec', 'sparsevec'];

export function isVectorTypeName(value: string): value is VectorTypeName {
  return (VECTOR_TYPE_NAMES as readonly string[]).includes(value);
}

/**
 * An immutable vector value that knows its own wire representation.
 */
export interface VectorValue {
  /** Tag naming the PostgreSQL type this value encodes to */
  readonly kind: VectorTypeName;
  /** Number of dimensions */
  size(): number;
  /** Dense list of double-precision values */
  toFloatList(): number[];
  /** Binary transfer representation, header included */
  toDatabaseBinary(): Buffer;
  /**
   * Hook called by `pg` when the value is a query parameter.
   * A Buffer result is sent in binary format.
   */
  toPostgres(): Buffer;
  /** Structural equality: same kind, same fields, same bytes */
  equals(other: unknown): boolean;
  /** Compact description, without the items */
  toString(): string;
  toJSON(): number[];
}

/**
 * Constructors of one vector kind.
 */
export interface VectorKind<V extends VectorValue = VectorValue> {
  readonly typeName: V['kind'];
  /** Operator class for cosine distance indexes, e.g. `USING hnsw (col vector_cosine_ops)` */
  readonly cosineOps: string;
  /** The zero-dimension vector */
  empty(): V;
  fromFloatList(values: ArrayLike<number>): V;
  fromDatabaseBinary(data: Uint8Array): V;
  /**
   * Build a vector from base64 text holding big-endian float32 values.
   * Lets a float list cross a text-only boundary (such as JSON) without loss.
   */
  fromFloatBase64(text: string): V;
  /** Build a vector from the type's text output, as `pg` returns it */
  fromText(text: string): V;
  isInstance(value: unknown): value is V;
}
