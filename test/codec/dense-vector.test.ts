import { describe, it, expect } from 'vitest';
import { inspect } from 'node:util';
import { DenseVector, HalfVector, Vector } from '../../src/codec/dense-vector.js';
import { encodeFloatBase64 } from '../../src/codec/float-base64.js';
import { FormatError, isErrorWithCode } from '../../src/utils/errors.js';

const HEADER_DIM_3 = Buffer.from('00030000', 'hex');

describe('dense vectors', () => {
  describe('empty vector', () => {
    it('has zero dimensions', () => {
      expect(Vector.empty().size()).toBe(0);
      expect(HalfVector.empty().size()).toBe(0);
      expect(new DenseVector('vector').size()).toBe(0);
    });

    it('encodes to the bare header', () => {
      expect(Vector.empty().toDatabaseBinary().toString('hex')).toBe('00000000');
      expect(HalfVector.empty().toDatabaseBinary().toString('hex')).toBe('00000000');
    });

    it('comes from an empty list', () => {
      expect(Vector.fromFloatList([]).equals(Vector.empty())).toBe(true);
    });
  });

  describe('Vector', () => {
    it('uses 4 bytes per item', () => {
      expect(Vector.bytesPerItem).toBe(4);
      expect(Vector.fromFloatList([1, 2, 3]).size()).toBe(3);
    });

    it('writes the wire layout', () => {
      const wire = Vector.fromFloatList([1, -2.5, 0]).toDatabaseBinary();
      expect(wire.toString('hex')).toBe('0003' + '0000' + '3f800000' + 'c0200000' + '00000000');
    });

    it('round-trips float32 values exactly', () => {
      const values = Array.from({ length: 1536 }, (_, i) => Math.fround(Math.sin(i)));
      expect(Vector.fromFloatList(values).toFloatList()).toEqual(values);
    });

    it('narrows doubles to float32', () => {
      expect(Vector.fromFloatList([0.1]).toFloatList()).toEqual([0.10000000149011612]);
    });

    it('round-trips through the wire format', () => {
      const vector = Vector.fromFloatList([0.5, -1.25, 3, 1024]);
      const decoded = Vector.fromDatabaseBinary(vector.toDatabaseBinary());
      expect(decoded.equals(vector)).toBe(true);
      expect(decoded.toFloatList()).toEqual([0.5, -1.25, 3, 1024]);
    });

    it('rejects a header declaring more items than present', () => {
      const data = Buffer.concat([HEADER_DIM_3, Buffer.alloc(8)]);
      expect(() => Vector.fromDatabaseBinary(data)).toThrow(FormatError);
      expect(() => Vector.fromDatabaseBinary(data)).toThrow('expected size: 4 * 3; got 8 bytes');
    });

    it('rejects trailing bytes', () => {
      const data = Buffer.concat([HEADER_DIM_3, Buffer.alloc(13)]);
      expect(() => Vector.fromDatabaseBinary(data)).toThrow('expected size: 4 * 3; got 13 bytes');
    });

    it('rejects a truncated header', () => {
      try {
        Vector.fromDatabaseBinary(Buffer.from([0, 1]));
        expect.fail('should have thrown');
      } catch (error) {
        expect(isErrorWithCode(error, 'TRUNCATED_HEADER')).toBe(true);
      }
    });

    it('ignores the reserved field on read and writes zero', () => {
      const vector = Vector.fromDatabaseBinary(Buffer.from('0001ffff3f800000', 'hex'));
      expect(vector.toFloatList()).toEqual([1]);
      expect(vector.toDatabaseBinary().toString('hex')).toBe('000100003f800000');
    });

    it('accepts a plain Uint8Array', () => {
      const bytes = new Uint8Array([0, 1, 0, 0, 0x3f, 0x80, 0, 0]);
      expect(Vector.fromDatabaseBinary(bytes).toFloatList()).toEqual([1]);
    });

    it('does not share memory with its input', () => {
      const wire = Buffer.from('000100003f800000', 'hex');
      const vector = Vector.fromDatabaseBinary(wire);
      wire.fill(0);
      expect(vector.toFloatList()).toEqual([1]);
    });

    it('hands out copies of its bytes', () => {
      const vector = Vector.fromFloatList([1]);
      vector.toBytes().fill(0);
      expect(vector.toFloatList()).toEqual([1]);
    });

    it('rejects item bytes that are not whole floats', () => {
      expect(() => new DenseVector('vector', Buffer.alloc(3))).toThrow(FormatError);
    });

    it('rejects more dimensions than the header can hold', () => {
      const vector = Vector.fromFloatList(new Array<number>(65536).fill(0));
      expect(() => vector.toDatabaseBinary()).toThrow(FormatError);
    });

    it('reads base64 float32 text as item bytes', () => {
      expect(Vector.fromFloatBase64('P4AAAMAgAAAAAAAA').toFloatList()).toEqual([1, -2.5, 0]);
      expect(Vector.fromFloatBase64(encodeFloatBase64([1, -2.5, 0])).toFloatList()).toEqual([
        1, -2.5, 0,
      ]);
    });

    it('rejects base64 text that is not whole floats', () => {
      expect(() => Vector.fromFloatBase64(Buffer.alloc(6).toString('base64'))).toThrow(FormatError);
    });
  });

  describe('HalfVector', () => {
    it('uses 2 bytes per item', () => {
      expect(HalfVector.bytesPerItem).toBe(2);
      expect(HalfVector.fromFloatList([1, 2, 3]).toBytes().length).toBe(6);
    });

    it('writes the wire layout', () => {
      const wire = HalfVector.fromFloatList([1, -2]).toDatabaseBinary();
      expect(wire.toString('hex')).toBe('0002' + '0000' + '3c00' + 'c000');
    });

    it('rounds values to half precision', () => {
      expect(HalfVector.fromFloatList([0.1, 1, 65504]).toFloatList()).toEqual([
        0.0999755859375, 1, 65504,
      ]);
    });

    it('round-trips through the wire format', () => {
      const vector = HalfVector.fromFloatList([0.25, -0.75, 8]);
      expect(HalfVector.fromDatabaseBinary(vector.toDatabaseBinary()).equals(vector)).toBe(true);
    });

    it('checks length against half-width items', () => {
      const header = Buffer.from('00020000', 'hex');
      expect(HalfVector.fromDatabaseBinary(Buffer.concat([header, Buffer.alloc(4)])).size()).toBe(2);
      expect(() => HalfVector.fromDatabaseBinary(Buffer.concat([header, Buffer.alloc(3)]))).toThrow(
        'expected size: 2 * 2; got 3 bytes',
      );
    });

    it('reads base64 float32 text through the float list', () => {
      expect(HalfVector.fromFloatBase64(encodeFloatBase64([1, -2.5, 0])).toFloatList()).toEqual([
        1, -2.5, 0,
      ]);
      expect(HalfVector.fromFloatBase64('P4AAAMAAAAA=').toDatabaseBinary().toString('hex')).toBe(
        '000200003c00c000',
      );
    });
  });

  describe('text output', () => {
    it('parses into the same vector as the float list', () => {
      expect(Vector.fromText('[1,-2.5,0]').equals(Vector.fromFloatList([1, -2.5, 0]))).toBe(true);
      expect(HalfVector.fromText('[1,-2]').toDatabaseBinary().toString('hex')).toBe(
        '000200003c00c000',
      );
    });

    it('rejects text that is not a list', () => {
      expect(() => Vector.fromText('{1:1}/1')).toThrow(FormatError);
    });
  });

  describe('index operator classes', () => {
    it('names the cosine operator class of each kind', () => {
      expect(Vector.cosineOps).toBe('vector_cosine_ops');
      expect(HalfVector.cosineOps).toBe('halfvec_cosine_ops');
    });
  });

  describe('value semantics', () => {
    it('compares by kind and bytes', () => {
      expect(Vector.fromFloatList([1, 2]).equals(Vector.fromFloatList([1, 2]))).toBe(true);
      expect(Vector.fromFloatList([1, 2]).equals(Vector.fromFloatList([2, 1]))).toBe(false);
      expect(Vector.fromBytes(Buffer.from('3c003c00', 'hex')).equals(
        HalfVector.fromBytes(Buffer.from('3c003c00', 'hex')),
      )).toBe(false);
      expect(Vector.empty().equals(null)).toBe(false);
    });

    it('tells its own kind apart', () => {
      expect(Vector.isInstance(Vector.empty())).toBe(true);
      expect(Vector.isInstance(HalfVector.empty())).toBe(false);
      expect(HalfVector.isInstance([1, 2])).toBe(false);
    });

    it('prints a compact description', () => {
      expect(Vector.fromFloatList(new Array<number>(1536).fill(0.5)).toString()).toBe(
        'Vector(dim=1536)',
      );
      expect(String(HalfVector.fromFloatList([1, 2, 3]))).toBe('HalfVector(dim=3)');
    });

    it('shows every item byte when inspected', () => {
      expect(inspect(Vector.fromFloatList([1, -2.5]))).toBe('Vector(3f800000c0200000)');
      expect(inspect(HalfVector.fromFloatList([1, -2]))).toBe('HalfVector(3c00c000)');

      const large = Vector.fromFloatList(new Array<number>(1536).fill(0.5));
      expect(inspect(large).length).toBeGreaterThan(1000);
      expect(String(large).length).toBeLessThan(64);
    });

    it('serializes to JSON as a float list', () => {
      expect(JSON.stringify({ embedding: Vector.fromFloatList([1, 2]) })).toBe(
        '{"embedding":[1,2]}',
      );
    });

    it('hands pg its wire bytes', () => {
      const vector = HalfVector.fromFloatList([1]);
      expect(vector.toPostgres().equals(vector.toDatabaseBinary())).toBe(true);
    });
  });
});
