/**
 * shapewise - type-directed SCALE encoding for TypeScript
 *
 * Encodes a value into the wire form of a target type that is described at
 * run time by a type resolver, rather than by the value's own static type.
 *
 * @example
 * ```typescript
 * import { TypeRegistry, encodeAsType } from 'shapewise';
 *
 * const types = new TypeRegistry();
 * const point = types.composite([
 *   { name: "x", type: types.primitive("u8") },
 *   { name: "y", type: types.primitive("u8") },
 * ]);
 *
 * // Field order follows the target type: [2, 1]
 * const data = encodeAsType({ y: 1, x: 2 }, point, types);
 * ```
 */

// Target type descriptions
export type {
  IntegerKind,
  PrimitiveKind,
  BitOrder,
  BitStore,
  Field,
  VariantDef,
  TypeShape,
  ShapeKind,
  TypeResolver,
  IntegerBounds,
} from "./types";
export {
  INTEGER_BOUNDS,
  BIT_STORE_BITS,
  MAX_CODE_POINT,
  isIntegerKind,
  isUnsignedKind,
  describeShape,
  singleInnerType,
} from "./types";

// Errors
export {
  ShapewiseError,
  EncodeErrorKind,
  EncodeError,
  WrongShapeError,
  WrongLengthError,
  NumberOutOfRangeError,
  CannotFindFieldError,
  DuplicateFieldError,
  CannotFindVariantError,
  UnsupportedError,
  RecursionLimitExceededError,
  TypeNotFoundError,
  TypeResolvingError,
  CustomError,
  DecodeError,
  BufferUnderflowError,
  TypeNotRegisteredError,
} from "./errors";

// Error paths
export type { Location } from "./location";
export { fieldLocation, variantLocation, indexLocation, formatPath } from "./location";

// Source values
export type { Encodable, EncodableRecord, EncodeAsType, EncodeAsFields, FieldValue } from "./values";
export { Composite, Variant, Bits, Char, variant, some, none, ok, err } from "./values";

// Encoding
export type { EncodeOptions } from "./encoder";
export {
  Encoder,
  DEFAULT_MAX_DEPTH,
  encodeAsType,
  encodeAsTypeTo,
  encodeAsFields,
  encodeAsFieldsTo,
  fieldsFromIds,
} from "./encoder";

// Code generation
export type { FieldSpec, RecordOptions, UnionVariantSpec, UnionVariants } from "./derive";
export { DerivedRecord, DerivedVariant, deriveRecord, deriveUnion } from "./derive";

// Registry
export type { TypeId, VariantSpec } from "./registry";
export { TypeRegistry } from "./registry";

// Writer
export { Writer } from "./writer";

// Reader
export { Reader } from "./reader";

/**
 * Library version.
 */
export const VERSION = "0.3.0";
