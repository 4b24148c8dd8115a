import { BitOrder, BitStore } from "./types";
import { Source } from "./values";
import { Writer } from "./writer";

function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

/**
 * The bits of a source: a {@link Bits} value, or a sequence made only of
 * booleans.
 */
export function bitsOf(source: Source): readonly boolean[] | undefined {
  if (source.kind === "bits") {
    return source.bits;
  }
  if (source.kind !== "sequence") {
    return undefined;
  }
  const items = source.items;
  return items.every(isBoolean) ? items : undefined;
}

/**
 * Encodes a bit source into a bit-sequence target of the given order and
 * storage width.
 *
 * @returns false when the source holds no bits
 */
export function encodeBits(source: Source, order: BitOrder, store: BitStore, out: Writer): boolean {
  const bits = bitsOf(source);
  if (bits === undefined) {
    return false;
  }
  out.writeBits(bits, order, store);
  return true;
}
