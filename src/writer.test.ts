import { describe, it, expect } from 'vitest';
import { Writer } from './writer';

function bytesOf(write: (writer: Writer) => void): number[] {
  const writer = new Writer();
  write(writer);
  return Array.from(writer.bytes());
}

describe('Writer', () => {
  describe('compact', () => {
    it('encodes 0', () => {
      expect(bytesOf((w) => w.writeCompact(0))).toEqual([0x00]);
    });

    it('encodes 1', () => {
      expect(bytesOf((w) => w.writeCompact(1))).toEqual([0x04]);
    });

    it('encodes 63 in one byte', () => {
      expect(bytesOf((w) => w.writeCompact(63))).toEqual([0xfc]);
    });

    it('encodes 64 in two bytes', () => {
      expect(bytesOf((w) => w.writeCompact(64))).toEqual([0x01, 0x01]);
    });

    it('encodes 300', () => {
      expect(bytesOf((w) => w.writeCompact(300))).toEqual([0xb1, 0x04]);
    });

    it('encodes 16383 in two bytes', () => {
      expect(bytesOf((w) => w.writeCompact(16383))).toEqual([0xfd, 0xff]);
    });

    it('encodes 16384 in four bytes', () => {
      expect(bytesOf((w) => w.writeCompact(16384))).toEqual([0x02, 0x00, 0x01, 0x00]);
    });

    it('encodes 2^30 in big-integer mode', () => {
      expect(bytesOf((w) => w.writeCompact(1n << 30n))).toEqual([0x03, 0x00, 0x00, 0x00, 0x40]);
    });

    it('encodes 2^32 with five value bytes', () => {
      expect(bytesOf((w) => w.writeCompact(1n << 32n))).toEqual([0x07, 0x00, 0x00, 0x00, 0x00, 0x01]);
    });

    it('encodes u64 max', () => {
      expect(bytesOf((w) => w.writeCompact((1n << 64n) - 1n))).toEqual([
        0x13, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff,
      ]);
    });

    it('rejects negative values', () => {
      expect(() => bytesOf((w) => w.writeCompact(-1))).toThrow(RangeError);
    });
  });

  describe('fixed-width integers', () => {
    it('writes u16 little-endian', () => {
      expect(bytesOf((w) => w.writeInt('u16', 0x1234n))).toEqual([0x34, 0x12]);
    });

    it('writes i8 -1 as two\'s complement', () => {
      expect(bytesOf((w) => w.writeInt('i8', -1n))).toEqual([0xff]);
    });

    it('writes i32 -2', () => {
      expect(bytesOf((w) => w.writeInt('i32', -2n))).toEqual([0xfe, 0xff, 0xff, 0xff]);
    });

    it('writes u128 with sixteen bytes', () => {
      const bytes = bytesOf((w) => w.writeInt('u128', 1n));
      expect(bytes.length).toBe(16);
      expect(bytes[0]).toBe(1);
    });

    it('rejects values that do not fit', () => {
      expect(() => bytesOf((w) => w.writeInt('u8', 256n))).toThrow(RangeError);
      expect(() => bytesOf((w) => w.writeInt('i8', -129n))).toThrow(RangeError);
    });
  });

  describe('bool and char', () => {
    it('writes booleans as one byte', () => {
      expect(bytesOf((w) => {
        w.writeBool(true);
        w.writeBool(false);
      })).toEqual([1, 0]);
    });

    it('writes chars as u32 code points', () => {
      expect(bytesOf((w) => w.writeChar(0x41))).toEqual([0x41, 0x00, 0x00, 0x00]);
      expect(bytesOf((w) => w.writeChar(0x1f600))).toEqual([0x00, 0xf6, 0x01, 0x00]);
    });

    it('rejects code points past U+10FFFF', () => {
      expect(() => bytesOf((w) => w.writeChar(0x110000))).toThrow(RangeError);
    });
  });

  describe('string', () => {
    it('encodes "hello"', () => {
      expect(bytesOf((w) => w.writeString('hello'))).toEqual([0x14, 104, 101, 108, 108, 111]);
    });

    it('encodes empty string', () => {
      expect(bytesOf((w) => w.writeString(''))).toEqual([0x00]);
    });

    it('prefixes the UTF-8 byte length', () => {
      expect(bytesOf((w) => w.writeString('é'))).toEqual([0x08, 0xc3, 0xa9]);
    });
  });

  describe('variant index', () => {
    it('writes the index as one byte', () => {
      expect(bytesOf((w) => w.writeVariantIndex(255))).toEqual([0xff]);
    });

    it('rejects indexes past 255', () => {
      expect(() => bytesOf((w) => w.writeVariantIndex(256))).toThrow(RangeError);
    });
  });

  describe('bit sequences', () => {
    const bits = [true, false, true];

    it('packs lsb0 into u8', () => {
      expect(bytesOf((w) => w.writeBits(bits, 'lsb0', 'u8'))).toEqual([0x0c, 0x05]);
    });

    it('packs msb0 into u8', () => {
      expect(bytesOf((w) => w.writeBits(bits, 'msb0', 'u8'))).toEqual([0x0c, 0xa0]);
    });

    it('packs lsb0 into u16', () => {
      expect(bytesOf((w) => w.writeBits(bits, 'lsb0', 'u16'))).toEqual([0x0c, 0x05, 0x00]);
    });

    it('packs msb0 into u16', () => {
      expect(bytesOf((w) => w.writeBits(bits, 'msb0', 'u16'))).toEqual([0x0c, 0x00, 0xa0]);
    });

    it('spills into a second word', () => {
      const nine = new Array<boolean>(9).fill(true);
      expect(bytesOf((w) => w.writeBits(nine, 'lsb0', 'u8'))).toEqual([0x24, 0xff, 0x01]);
    });

    it('writes an empty sequence as its length only', () => {
      expect(bytesOf((w) => w.writeBits([], 'msb0', 'u32'))).toEqual([0x00]);
    });
  });

  describe('buffer management', () => {
    it('grows past the initial capacity', () => {
      const writer = new Writer(1);
      for (let i = 0; i < 300; i++) {
        writer.writeByte(i);
      }
      expect(writer.position).toBe(300);
      expect(writer.bytes()[299]).toBe(299 & 0xff);
    });

    it('writes length-prefixed bytes', () => {
      expect(bytesOf((w) => w.writeLengthPrefixedBytes(new Uint8Array([9, 8])))).toEqual([0x08, 9, 8]);
    });

    it('resets for reuse', () => {
      const writer = new Writer();
      writer.writeString('abc');
      writer.reset();
      writer.writeByte(7);
      expect(Array.from(writer.bytes())).toEqual([7]);
    });
  });
});
