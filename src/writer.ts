import { BIT_STORE_BITS, BitOrder, BitStore, INTEGER_BOUNDS, IntegerKind, MAX_CODE_POINT } from "./types";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

/** Values below this fit the single-byte compact mode. */
const COMPACT_SINGLE_BYTE_LIMIT = 1n << 6n;
/** Values below this fit the two-byte compact mode. */
const COMPACT_TWO_BYTE_LIMIT = 1n << 14n;
/** Values below this fit the four-byte compact mode. */
const COMPACT_FOUR_BYTE_LIMIT = 1n << 30n;
/** The big-integer compact mode stores its byte count minus four in six bits. */
const COMPACT_MAX_BYTES = 67;

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

/**
 * Writer encodes SCALE data into a binary buffer.
 *
 * It knows nothing about types: callers decide which primitive to write and
 * are expected to have range-checked values already. Out-of-range input is
 * rejected with a RangeError rather than wrapped.
 */
export class Writer {
  private buffer: Uint8Array;
  private pos: number;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has at least the specified capacity.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer);
    this.buffer = newBuffer;
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes raw bytes.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes a boolean as a single byte.
   */
  writeBool(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  /**
   * Writes a fixed-width little-endian integer of the given kind.
   * @throws RangeError if the value does not fit the kind
   */
  writeInt(kind: IntegerKind, value: bigint): void {
    const bounds = INTEGER_BOUNDS[kind];
    if (value < bounds.min || value > bounds.max) {
      throw new RangeError(`Value ${value} does not fit ${kind} [${bounds.min}, ${bounds.max}]`);
    }
    this.writeUintLE(BigInt.asUintN(bounds.bytes * 8, value), bounds.bytes);
  }

  /**
   * Writes a char as its u32 code point.
   */
  writeChar(codePoint: number): void {
    if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > MAX_CODE_POINT) {
      throw new RangeError(`Invalid code point: ${codePoint}`);
    }
    this.writeUintLE(BigInt(codePoint), 4);
  }

  /**
   * Writes an unsigned integer in SCALE compact form.
   *
   * Values below 2^6, 2^14 and 2^30 take one, two and four bytes; anything
   * larger is written as a length byte followed by the minimal little-endian
   * bytes of the value (at least four).
   */
  writeCompact(value: bigint | number): void {
    const v = BigInt(value);
    if (v < 0n) {
      throw new RangeError(`Compact integers are unsigned, got ${v}`);
    }

    if (v < COMPACT_SINGLE_BYTE_LIMIT) {
      this.writeByte(Number(v << 2n));
    } else if (v < COMPACT_TWO_BYTE_LIMIT) {
      this.writeUintLE((v << 2n) | 0b01n, 2);
    } else if (v < COMPACT_FOUR_BYTE_LIMIT) {
      this.writeUintLE((v << 2n) | 0b10n, 4);
    } else {
      let len = 0;
      for (let rest = v; rest > 0n; rest >>= 8n) {
        len++;
      }
      len = Math.max(len, 4);
      if (len > COMPACT_MAX_BYTES) {
        throw new RangeError(`Value ${v} is too large for compact encoding`);
      }
      this.writeByte(((len - 4) << 2) | 0b11);
      this.writeUintLE(v, len);
    }
  }

  /**
   * Writes the length prefix of a sequence.
   */
  writeSequenceLength(length: number): void {
    this.writeCompact(length);
  }

  /**
   * Writes the index byte that selects a variant.
   */
  writeVariantIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index > 0xff) {
      throw new RangeError(`Variant index must fit in a byte, got ${index}`);
    }
    this.writeByte(index);
  }

  /**
   * Writes a compact-length-prefixed UTF-8 string.
   */
  writeString(value: string): void {
    const bytes = textEncoder.encode(value);
    this.writeCompact(bytes.length);
    this.writeBytes(bytes);
  }

  /**
   * Writes compact-length-prefixed bytes.
   */
  writeLengthPrefixedBytes(data: Uint8Array): void {
    this.writeCompact(data.length);
    this.writeBytes(data);
  }

  /**
   * Writes a bit-sequence: the compact bit count, then the bits packed into
   * little-endian words of `store` width. Within a word, bit 0 of the
   * sequence lands on the least significant bit for `lsb0` and on the most
   * significant bit for `msb0`.
   */
  writeBits(bits: readonly boolean[], order: BitOrder, store: BitStore): void {
    const width = BIT_STORE_BITS[store];
    const wordCount = Math.ceil(bits.length / width);

    this.writeCompact(bits.length);
    for (let w = 0; w < wordCount; w++) {
      let word = 0n;
      const end = Math.min(bits.length - w * width, width);
      for (let b = 0; b < end; b++) {
        if (bits[w * width + b]) {
          word |= 1n << BigInt(order === "lsb0" ? b : width - 1 - b);
        }
      }
      this.writeUintLE(word, width / 8);
    }
  }

  private writeUintLE(value: bigint, byteCount: number): void {
    this.ensureCapacity(byteCount);
    let rest = value;
    for (let i = 0; i < byteCount; i++) {
      this.buffer[this.pos++] = Number(rest & 0xffn);
      rest >>= 8n;
    }
  }
}
