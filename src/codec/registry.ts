/**
 * Lookup of vector kinds by PostgreSQL type name.
 */

import { DenseVector, HalfVector, Vector, type DenseVectorKind } from './dense-vector.js';
import { SparseVector } from './sparse-vector.js';
import type { VectorKind, VectorTypeName, VectorValue } from './types.js';

export interface VectorKindMap {
  vector: DenseVectorKind<'vector'>;
  halfvec: DenseVectorKind<'halfvec'>;
  sparsevec: VectorKind<SparseVector>;
}

export const VECTOR_KINDS: VectorKindMap = {
  vector: Vector,
  halfvec: HalfVector,
  sparsevec: SparseVector,
};

export function getVectorKind<T extends VectorTypeName>(typeName: T): VectorKindMap[T] {
  return VECTOR_KINDS[typeName];
}

/**
 * Check whether a value is a vector of any supported kind.
 */
export function isVectorValue(value: unknown): value is VectorValue {
  return value instanceof DenseVector || value instanceof SparseVector;
}
