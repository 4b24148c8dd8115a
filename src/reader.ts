import { BufferUnderflowError, DecodeError } from "./errors";
import { BIT_STORE_BITS, BitOrder, BitStore, INTEGER_BOUNDS, IntegerKind } from "./types";

// Module-level singleton to avoid repeated instantiation
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Reader decodes SCALE primitives from a binary buffer.
 *
 * It mirrors {@link Writer} one primitive at a time; it does not decode
 * values against a type.
 */
export class Reader {
  private buffer: Uint8Array;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.pos = 0;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Checks if there are enough bytes available.
   */
  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new BufferUnderflowError(needed, this.remaining);
    }
  }

  /**
   * Reads a raw byte.
   */
  readByte(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads raw bytes.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * Reads a boolean. Any byte other than 0 or 1 is rejected.
   */
  readBool(): boolean {
    const b = this.readByte();
    if (b > 1) {
      throw new DecodeError(`Invalid boolean byte: ${b}`);
    }
    return b === 1;
  }

  /**
   * Reads a fixed-width little-endian integer of the given kind.
   */
  readInt(kind: IntegerKind): bigint {
    const bounds = INTEGER_BOUNDS[kind];
    const raw = this.readUintLE(bounds.bytes);
    return bounds.signed ? BigInt.asIntN(bounds.bytes * 8, raw) : raw;
  }

  /**
   * Reads a fixed-width integer as a JavaScript number.
   *
   * WARNING: JavaScript numbers can only safely represent integers
   * up to Number.MAX_SAFE_INTEGER (2^53-1). Use readInt() for 64 and
   * 128-bit values that may exceed it.
   *
   * @param warnOnPrecisionLoss - If true (default), logs a warning when
   *                              precision loss occurs
   */
  readIntAsNumber(kind: IntegerKind, warnOnPrecisionLoss: boolean = true): number {
    const value = this.readInt(kind);
    if (warnOnPrecisionLoss) {
      if (value > BigInt(Number.MAX_SAFE_INTEGER) ||
          value < BigInt(Number.MIN_SAFE_INTEGER)) {
        console.warn(
          `shapewise: ${kind} value ${value} exceeds safe integer range ` +
          `(${Number.MIN_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}), ` +
          `precision may be lost. Use readInt() for full precision.`
        );
      }
    }
    return Number(value);
  }

  /**
   * Reads a char stored as its u32 code point.
   */
  readChar(): string {
    const codePoint = Number(this.readUintLE(4));
    if (codePoint > 0x10ffff) {
      throw new DecodeError(`Invalid code point: ${codePoint}`);
    }
    return String.fromCodePoint(codePoint);
  }

  /**
   * Reads a SCALE compact unsigned integer.
   */
  readCompact(): bigint {
    const first = this.readByte();
    switch (first & 0b11) {
      case 0b00:
        return BigInt(first >> 2);
      case 0b01:
        return ((BigInt(this.readByte()) << 8n) | BigInt(first)) >> 2n;
      case 0b10:
        return ((this.readUintLE(3) << 8n) | BigInt(first)) >> 2n;
      default:
        return this.readUintLE((first >> 2) + 4);
    }
  }

  /**
   * Reads a compact value expected to fit a JavaScript number, such as a
   * length prefix.
   */
  readCompactAsNumber(warnOnPrecisionLoss: boolean = true): number {
    const value = this.readCompact();
    if (warnOnPrecisionLoss && value > BigInt(Number.MAX_SAFE_INTEGER)) {
      console.warn(
        `shapewise: compact value ${value} exceeds safe integer range ` +
        `(max ${Number.MAX_SAFE_INTEGER}), precision may be lost. ` +
        `Use readCompact() for full precision.`
      );
    }
    return Number(value);
  }

  /**
   * Reads a compact-length-prefixed UTF-8 string.
   */
  readString(): string {
    const length = this.readCompactAsNumber();
    try {
      return textDecoder.decode(this.readBytes(length));
    } catch (e) {
      if (e instanceof TypeError) {
        throw new DecodeError(`Invalid UTF-8 in string: ${e.message}`);
      }
      throw e;
    }
  }

  /**
   * Reads compact-length-prefixed bytes.
   */
  readLengthPrefixedBytes(): Uint8Array {
    const length = this.readCompactAsNumber();
    return this.readBytes(length);
  }

  /**
   * Reads a bit-sequence written by {@link Writer.writeBits}.
   */
  readBits(order: BitOrder, store: BitStore): boolean[] {
    const width = BIT_STORE_BITS[store];
    const length = this.readCompactAsNumber();
    const bits: boolean[] = [];

    while (bits.length < length) {
      const word = this.readUintLE(width / 8);
      const end = Math.min(length - bits.length, width);
      for (let b = 0; b < end; b++) {
        const shift = BigInt(order === "lsb0" ? b : width - 1 - b);
        bits.push(((word >> shift) & 1n) === 1n);
      }
    }
    return bits;
  }

  private readUintLE(byteCount: number): bigint {
    const bytes = this.readBytes(byteCount);
    let value = 0n;
    for (let i = byteCount - 1; i >= 0; i--) {
      value = (value << 8n) | BigInt(bytes[i]);
    }
    return value;
  }
}
