import { describe, it, expect, vi, afterEach } from 'vitest';
import { Reader } from './reader';
import { Writer } from './writer';
import { BufferUnderflowError, DecodeError } from './errors';

describe('Reader', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads what the writer wrote', () => {
    const writer = new Writer();
    writer.writeBool(true);
    writer.writeInt('i16', -300n);
    writer.writeChar(0x1f600);
    writer.writeCompact(16384);
    writer.writeString('hello, shapewise');
    writer.writeLengthPrefixedBytes(new Uint8Array([1, 2, 3]));
    writer.writeBits([true, false, true, true], 'msb0', 'u16');

    const reader = new Reader(writer.bytes());
    expect(reader.readBool()).toBe(true);
    expect(reader.readInt('i16')).toBe(-300n);
    expect(reader.readChar()).toBe('😀');
    expect(reader.readCompact()).toBe(16384n);
    expect(reader.readString()).toBe('hello, shapewise');
    expect(Array.from(reader.readLengthPrefixedBytes())).toEqual([1, 2, 3]);
    expect(reader.readBits('msb0', 'u16')).toEqual([true, false, true, true]);
    expect(reader.hasMore).toBe(false);
  });

  it('reads compact values in every mode', () => {
    const values = [0n, 63n, 64n, 16383n, 16384n, (1n << 30n) - 1n, 1n << 30n, (1n << 128n) - 1n];
    const writer = new Writer();
    for (const v of values) {
      writer.writeCompact(v);
    }
    const reader = new Reader(writer.bytes());
    expect(values.map(() => reader.readCompact())).toEqual(values);
  });

  it('rejects boolean bytes other than 0 and 1', () => {
    const reader = new Reader(new Uint8Array([2]));
    expect(() => reader.readBool()).toThrow(DecodeError);
  });

  it('reports underflow', () => {
    const reader = new Reader(new Uint8Array([1, 2]));
    expect(() => reader.readInt('u32')).toThrow(BufferUnderflowError);
    expect(() => reader.readInt('u32')).toThrow('Buffer underflow: needed 4 bytes, only 2 available');
  });

  it('rejects invalid UTF-8', () => {
    const reader = new Reader(new Uint8Array([0x04, 0xff]));
    expect(() => reader.readString()).toThrow(DecodeError);
  });

  it('warns when a u64 loses precision as a number', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const writer = new Writer();
    writer.writeInt('u64', (1n << 64n) - 1n);

    const reader = new Reader(writer.bytes());
    reader.readIntAsNumber('u64');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(/^shapewise: u64 value 18446744073709551615 exceeds safe integer range/);
  });

  it('stays quiet when the warning is turned off', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const writer = new Writer();
    writer.writeCompact(1n << 60n);

    const reader = new Reader(writer.bytes());
    expect(reader.readCompactAsNumber(false)).toBe(2 ** 60);
    expect(warn).not.toHaveBeenCalled();
  });

  it('reads small values as numbers without warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const writer = new Writer();
    writer.writeInt('i64', -5n);

    const reader = new Reader(writer.bytes());
    expect(reader.readIntAsNumber('i64')).toBe(-5);
    expect(warn).not.toHaveBeenCalled();
  });
});
