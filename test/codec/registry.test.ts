import { describe, it, expect } from 'vitest';
import { HalfVector, Vector } from '../../src/codec/dense-vector.js';
import { getVectorKind, isVectorValue } from '../../src/codec/registry.js';
import { SparseVector } from '../../src/codec/sparse-vector.js';
import { VECTOR_TYPE_NAMES, isVectorTypeName } from '../../src/codec/types.js';

describe('registry', () => {
  it('maps each type name to its kind', () => {
    expect(getVectorKind('vector')).toBe(Vector);
    expect(getVectorKind('halfvec')).toBe(HalfVector);
    expect(getVectorKind('sparsevec')).toBe(SparseVector);
  });

  it('keeps type names consistent with the kinds', () => {
    for (const name of VECTOR_TYPE_NAMES) {
      expect(getVectorKind(name).typeName).toBe(name);
      expect(getVectorKind(name).empty().kind).toBe(name);
    }
  });

  it('recognises type names', () => {
    expect(isVectorTypeName('halfvec')).toBe(true);
    expect(isVectorTypeName('bit')).toBe(false);
  });

  it('recognises vector values of any kind', () => {
    expect(isVectorValue(Vector.empty())).toBe(true);
    expect(isVectorValue(SparseVector.empty())).toBe(true);
    expect(isVectorValue([1, 2])).toBe(false);
    expect(isVectorValue({ kind: 'vector', toDatabaseBinary: () => Buffer.alloc(4) })).toBe(false);
  });
});
