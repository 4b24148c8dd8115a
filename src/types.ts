/**
 * Integer kinds a target type can ask for.
 */
export type IntegerKind =
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "u128"
  | "i8"
  | "i16"
  | "i32"
  | "i64"
  | "i128";

/**
 * Primitive kinds a target type can ask for.
 */
export type PrimitiveKind = "bool" | "char" | IntegerKind;

/**
 * Order of bits inside each storage word of a bit-sequence.
 */
export type BitOrder = "lsb0" | "msb0";

/**
 * Storage word a bit-sequence is packed into.
 */
export type BitStore = "u8" | "u16" | "u32" | "u64";

/**
 * A field of a composite or variant. Unnamed fields line up by position only.
 */
export interface Field<Id> {
  name?: string;
  type: Id;
}

/**
 * One variant of a variant type. `index` is the byte written on the wire and
 * need not match the variant's position in the list.
 */
export interface VariantDef<Id> {
  name: string;
  index: number;
  fields: Field<Id>[];
}

/**
 * The shape of a target type, as reported by a {@link TypeResolver}.
 */
export type TypeShape<Id> =
  | { kind: "primitive"; primitive: PrimitiveKind }
  | { kind: "compact"; inner: Id }
  | { kind: "composite"; fields: Field<Id>[] }
  | { kind: "variant"; variants: VariantDef<Id>[] }
  | { kind: "sequence"; element: Id }
  | { kind: "array"; element: Id; length: number }
  | { kind: "tuple"; elements: Id[] }
  | { kind: "str" }
  | { kind: "bitSequence"; order: BitOrder; store: BitStore }
  | { kind: "void" };

export type ShapeKind = TypeShape<unknown>["kind"];

/**
 * Provides type shapes for opaque type ids.
 *
 * Implementations must be read-only: the encoder may resolve the same id
 * several times during one call, and several calls may share a resolver.
 */
export interface TypeResolver<Id> {
  /** Returns the shape of `typeId`, or undefined if the id is unknown. */
  resolve(typeId: Id): TypeShape<Id> | undefined;
  /** Human-readable name for `typeId`, used in error messages. */
  describe?(typeId: Id): string;
}

/**
 * Bounds and width of an integer kind.
 */
export interface IntegerBounds {
  min: bigint;
  max: bigint;
  bytes: number;
  signed: boolean;
}

function unsigned(bytes: number): IntegerBounds {
  return { min: 0n, max: (1n << BigInt(bytes * 8)) - 1n, bytes, signed: false };
}

function signed(bytes: number): IntegerBounds {
  const half = 1n << BigInt(bytes * 8 - 1);
  return { min: -half, max: half - 1n, bytes, signed: true };
}

export const INTEGER_BOUNDS: Readonly<Record<IntegerKind, IntegerBounds>> = {
  u8: unsigned(1),
  u16: unsigned(2),
  u32: unsigned(4),
  u64: unsigned(8),
  u128: unsigned(16),
  i8: signed(1),
  i16: signed(2),
  i32: signed(4),
  i64: signed(8),
  i128: signed(16),
};

/**
 * Bits held by each storage word.
 */
export const BIT_STORE_BITS: Readonly<Record<BitStore, number>> = {
  u8: 8,
  u16: 16,
  u32: 32,
  u64: 64,
};

/**
 * Largest code point a char may hold.
 */
export const MAX_CODE_POINT = 0x10ffff;

export function isIntegerKind(kind: PrimitiveKind): kind is IntegerKind {
  return kind !== "bool" && kind !== "char";
}

export function isUnsignedKind(kind: PrimitiveKind): kind is IntegerKind {
  return isIntegerKind(kind) && !INTEGER_BOUNDS[kind].signed;
}

/**
 * Short description of a shape for error messages.
 */
export function describeShape<Id>(shape: TypeShape<Id>): string {
  switch (shape.kind) {
    case "primitive":
      return shape.primitive;
    case "compact":
      return "compact";
    case "composite":
      return `composite with ${shape.fields.length} field(s)`;
    case "variant":
      return `variant with ${shape.variants.length} variant(s)`;
    case "sequence":
      return "sequence";
    case "array":
      return `array of length ${shape.length}`;
    case "tuple":
      return `tuple of length ${shape.elements.length}`;
    case "str":
      return "str";
    case "bitSequence":
      return `bit sequence (${shape.order}, ${shape.store})`;
    case "void":
      return "void";
  }
}

/**
 * The type wrapped by a composite of one field or a tuple of one element.
 */
export function singleInnerType<Id>(shape: TypeShape<Id>): Id | undefined {
  if (shape.kind === "composite" && shape.fields.length === 1) {
    return shape.fields[0].type;
  }
  if (shape.kind === "tuple" && shape.elements.length === 1) {
    return shape.elements[0];
  }
  return undefined;
}
