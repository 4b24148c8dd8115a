import type { Encoder } from "./encoder";
import { NumberOutOfRangeError, WrongShapeError } from "./errors";
import { INTEGER_BOUNDS, IntegerKind, PrimitiveKind, isUnsignedKind } from "./types";
import { Source, describeSource } from "./values";
import { Writer } from "./writer";

/**
 * The numeric value of a source, for sources that have one. Chars count as
 * their code point.
 */
function numericValue(source: Source): number | bigint | undefined {
  switch (source.kind) {
    case "number":
      return source.value;
    case "char":
      return source.codePoint;
    default:
      return undefined;
  }
}

/**
 * Converts `value` to a bigint that fits `kind`, or throws.
 */
export function checkRange(value: number | bigint, kind: IntegerKind, expected: string): bigint {
  if (typeof value === "number" && !Number.isInteger(value)) {
    throw new NumberOutOfRangeError(String(value), expected);
  }
  const n = BigInt(value);
  const bounds = INTEGER_BOUNDS[kind];
  if (n < bounds.min || n > bounds.max) {
    throw new NumberOutOfRangeError(n.toString(), expected);
  }
  return n;
}

/**
 * Encodes a scalar source into a primitive target.
 *
 * @returns false when the source is not a scalar this primitive accepts
 */
export function encodePrimitive<Id>(
  source: Source,
  kind: PrimitiveKind,
  typeId: Id,
  encoder: Encoder<Id>,
  out: Writer,
): boolean {
  switch (kind) {
    case "bool":
      if (source.kind !== "bool") {
        return false;
      }
      out.writeBool(source.value);
      return true;
    case "char":
      if (source.kind !== "char") {
        return false;
      }
      out.writeChar(source.codePoint);
      return true;
    default: {
      const value = numericValue(source);
      if (value === undefined) {
        return false;
      }
      out.writeInt(kind, checkRange(value, kind, encoder.describe(typeId)));
      return true;
    }
  }
}

/**
 * Encodes a string source into a `str` target.
 */
export function encodeStr(source: Source, out: Writer): boolean {
  if (source.kind !== "str") {
    return false;
  }
  out.writeString(source.value);
  return true;
}

/**
 * Encodes a numeric source into `compact(inner)`. The inner type may be
 * wrapped in single-field composites; underneath it must be unsigned.
 */
export function encodeCompact<Id>(source: Source, inner: Id, encoder: Encoder<Id>, out: Writer): boolean {
  const value = numericValue(source);
  if (value === undefined) {
    return false;
  }

  const innerId = encoder.unwrapSingle(inner);
  const shape = encoder.resolve(innerId);
  if (shape.kind !== "primitive" || !isUnsignedKind(shape.primitive)) {
    throw new WrongShapeError(describeSource(source), `compact ${encoder.describe(innerId)}`);
  }
  out.writeCompact(checkRange(value, shape.primitive, encoder.describe(innerId)));
  return true;
}
