import { describe, it, expect } from 'vitest';
import { encodeAsType } from './encoder';
import { NumberOutOfRangeError, WrongLengthError } from './errors';
import { TypeRegistry } from './registry';
import { Bits, Composite } from './values';

function bytes(data: Uint8Array): number[] {
  return Array.from(data);
}

describe('aggregates', () => {
  const types = new TypeRegistry();
  const u8 = types.primitive('u8');
  const u16 = types.primitive('u16');
  const bool = types.primitive('bool');
  const str = types.str();

  describe('sequence', () => {
    const bools = types.sequence(bool);
    const u8s = types.sequence(u8);

    it('prefixes the element count', () => {
      expect(bytes(encodeAsType([true, true, true], bools, types))).toEqual([0x0c, 1, 1, 1]);
      expect(bytes(encodeAsType([], u8s, types))).toEqual([0x00]);
    });

    it('writes byte arrays into u8 sequences as they are', () => {
      expect(bytes(encodeAsType(new Uint8Array([1, 2, 3]), u8s, types))).toEqual([0x0c, 1, 2, 3]);
    });

    it('widens byte arrays into wider elements', () => {
      expect(bytes(encodeAsType(new Uint8Array([1, 2]), types.sequence(u16), types))).toEqual([0x08, 1, 0, 2, 0]);
    });

    it('takes sets, maps and composites', () => {
      expect(bytes(encodeAsType(new Set([4, 5]), u8s, types))).toEqual([0x08, 4, 5]);
      const map = new Map([
        ['a', 1],
        ['b', 2],
      ]);
      expect(bytes(encodeAsType(map, u8s, types))).toEqual([0x08, 1, 2]);
      expect(bytes(encodeAsType(Composite.unnamed([7, 8]), u8s, types))).toEqual([0x08, 7, 8]);
    });

    it('takes bits as booleans', () => {
      expect(bytes(encodeAsType(Bits.fromString('10'), bools, types))).toEqual([0x08, 1, 0]);
    });

    it('unwraps a record holding a single sequence', () => {
      expect(bytes(encodeAsType({ items: [1, 2] }, u8s, types))).toEqual([0x08, 1, 2]);
      expect(bytes(encodeAsType(Composite.unnamed([[1, 2]]), u8s, types))).toEqual([0x08, 1, 2]);
    });

    it('encodes nested records', () => {
      const entry = types.composite([{ name: 'x', type: u8 }]);
      expect(bytes(encodeAsType([{ x: 1 }, { x: 2 }], types.sequence(entry), types))).toEqual([0x08, 1, 2]);
    });

    it('locates element errors', () => {
      try {
        encodeAsType([1, 256], u8s, types);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(NumberOutOfRangeError);
        expect(e instanceof NumberOutOfRangeError && e.pathString).toBe('[1]');
      }
    });
  });

  describe('array', () => {
    it('writes elements without a prefix', () => {
      expect(bytes(encodeAsType([1, 2, 3], types.array(u8, 3), types))).toEqual([1, 2, 3]);
      expect(bytes(encodeAsType([true, false], types.array(bool, 2), types))).toEqual([1, 0]);
    });

    it('requires the declared length', () => {
      expect(() => encodeAsType([true, true, true], types.array(bool, 4), types)).toThrow(
        'Cannot encode to type; expected length 4 but got length 3',
      );
    });

    it('writes byte arrays into u8 arrays as they are', () => {
      expect(bytes(encodeAsType(new Uint8Array([9, 8]), types.array(u8, 2), types))).toEqual([9, 8]);
      expect(() => encodeAsType(new Uint8Array([9]), types.array(u8, 2), types)).toThrow(WrongLengthError);
    });
  });

  describe('tuple', () => {
    const pair = types.tuple([u8, str]);

    it('encodes arrays per position', () => {
      expect(bytes(encodeAsType([1, 'a'], pair, types))).toEqual([1, 0x04, 0x61]);
    });

    it('encodes records per position', () => {
      expect(bytes(encodeAsType({ n: 1, s: 'a' }, pair, types))).toEqual([1, 0x04, 0x61]);
    });

    it('rejects arrays of another length', () => {
      expect(() => encodeAsType([1, 2, 3], types.tuple([u8, u8]), types)).toThrow(WrongLengthError);
      expect(() => encodeAsType([1, 2], types.tuple([u8]), types)).toThrow(
        'Cannot encode to type; expected length 1 but got length 2',
      );
    });

    it('hands a whole array to a single sequence element', () => {
      expect(bytes(encodeAsType([1, 2, 3], types.tuple([types.sequence(u8)]), types))).toEqual([0x0c, 1, 2, 3]);
    });

    it('wraps a bare value into a single element', () => {
      expect(bytes(encodeAsType(5, types.tuple([u8]), types))).toEqual([5]);
    });

    it('encodes unit into the empty tuple', () => {
      expect(bytes(encodeAsType(null, types.tuple([]), types))).toEqual([]);
      expect(bytes(encodeAsType([], types.tuple([]), types))).toEqual([]);
    });
  });
});
