import { Location, fieldLocation, formatPath, indexLocation, variantLocation } from "./location";

/**
 * Base error class for shapewise errors.
 */
export class ShapewiseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ShapewiseError";
  }
}

/**
 * The nature of an encode failure.
 */
export enum EncodeErrorKind {
  WrongShape = "WrongShape",
  WrongLength = "WrongLength",
  NumberOutOfRange = "NumberOutOfRange",
  CannotFindField = "CannotFindField",
  DuplicateField = "DuplicateField",
  CannotFindVariant = "CannotFindVariant",
  Unsupported = "Unsupported",
  RecursionLimitExceeded = "RecursionLimitExceeded",
  TypeNotFound = "TypeNotFound",
  TypeResolving = "TypeResolving",
  Custom = "Custom",
}

/**
 * Error thrown when encoding fails.
 *
 * Each frame the error passes through on its way out appends its own
 * location, so by the time it reaches the caller `path` leads from the root
 * value down to the failure.
 */
export abstract class EncodeError extends ShapewiseError {
  abstract readonly kind: EncodeErrorKind;

  /** Description of the failure, without location. */
  readonly detail: string;

  // innermost first
  private readonly locations: Location[] = [];

  constructor(detail: string, options?: ErrorOptions) {
    super(detail, options);
    this.name = "EncodeError";
    this.detail = detail;
  }

  /**
   * Locations from the root value to the failure.
   */
  get path(): readonly Location[] {
    return [...this.locations].reverse();
  }

  get pathString(): string {
    return formatPath(this.path);
  }

  /**
   * Records that the error happened inside `location`.
   */
  at(location: Location): this {
    this.locations.push(location);
    this.message = `${this.detail} (at ${this.pathString})`;
    return this;
  }

  atField(name: string): this {
    return this.at(fieldLocation(name));
  }

  atIndex(index: number): this {
    return this.at(indexLocation(index));
  }

  atVariant(name: string): this {
    return this.at(variantLocation(name));
  }

  /**
   * Builds a {@link CustomError}; meant for custom encoding hooks.
   */
  static custom(message: string, options?: ErrorOptions): CustomError {
    return new CustomError(message, options);
  }
}

/**
 * The source value cannot be reconciled with the target type's shape.
 */
export class WrongShapeError extends EncodeError {
  readonly kind = EncodeErrorKind.WrongShape;

  constructor(
    readonly actual: string,
    readonly expected: string,
  ) {
    super(`Cannot encode ${actual} into type ${expected}`);
    this.name = "WrongShapeError";
  }
}

/**
 * Array, tuple or field counts do not line up.
 */
export class WrongLengthError extends EncodeError {
  readonly kind = EncodeErrorKind.WrongLength;

  constructor(
    readonly actualLen: number,
    readonly expectedLen: number,
  ) {
    super(`Cannot encode to type; expected length ${expectedLen} but got length ${actualLen}`);
    this.name = "WrongLengthError";
  }
}

/**
 * A number does not fit the target integer type.
 */
export class NumberOutOfRangeError extends EncodeError {
  readonly kind = EncodeErrorKind.NumberOutOfRange;

  constructor(
    readonly value: string,
    readonly expected: string,
  ) {
    super(`Number ${value} is out of range for target type ${expected}`);
    this.name = "NumberOutOfRangeError";
  }
}

/**
 * The target asks for a field the source does not have.
 */
export class CannotFindFieldError extends EncodeError {
  readonly kind = EncodeErrorKind.CannotFindField;

  constructor(readonly fieldName: string) {
    super(`Field ${fieldName} does not exist in the source value`);
    this.name = "CannotFindFieldError";
  }
}

/**
 * The source names the same field twice.
 */
export class DuplicateFieldError extends EncodeError {
  readonly kind = EncodeErrorKind.DuplicateField;

  constructor(readonly fieldName: string) {
    super(`Field ${fieldName} appears more than once in the source value`);
    this.name = "DuplicateFieldError";
  }
}

/**
 * No target variant matches the source variant.
 */
export class CannotFindVariantError extends EncodeError {
  readonly kind = EncodeErrorKind.CannotFindVariant;

  constructor(
    readonly variantName: string,
    readonly expected: string,
  ) {
    super(`Variant ${variantName} does not exist on type ${expected}`);
    this.name = "CannotFindVariantError";
  }
}

/**
 * The target type has no encoding for the given value.
 */
export class UnsupportedError extends EncodeError {
  readonly kind = EncodeErrorKind.Unsupported;

  constructor(
    readonly expected: string,
    reason: string,
  ) {
    super(`Cannot encode into type ${expected}: ${reason}`);
    this.name = "UnsupportedError";
  }
}

/**
 * The target type graph nests deeper than the configured limit.
 */
export class RecursionLimitExceededError extends EncodeError {
  readonly kind = EncodeErrorKind.RecursionLimitExceeded;

  constructor(readonly maxDepth: number) {
    super(`Type nesting exceeded the limit of ${maxDepth}`);
    this.name = "RecursionLimitExceededError";
  }
}

/**
 * The resolver knows nothing about a type id.
 */
export class TypeNotFoundError extends EncodeError {
  readonly kind = EncodeErrorKind.TypeNotFound;

  constructor(readonly typeId: string) {
    super(`Cannot find type with identifier ${typeId}`);
    this.name = "TypeNotFoundError";
  }
}

/**
 * The resolver threw while resolving a type.
 */
export class TypeResolvingError extends EncodeError {
  readonly kind = EncodeErrorKind.TypeResolving;

  constructor(typeId: string, cause: unknown) {
    super(`Failed to resolve type ${typeId}: ${describeCause(cause)}`, { cause });
    this.name = "TypeResolvingError";
  }
}

/**
 * A failure reported by a custom encoding hook.
 */
export class CustomError extends EncodeError {
  readonly kind = EncodeErrorKind.Custom;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CustomError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends ShapewiseError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when buffer is exhausted during decoding.
 */
export class BufferUnderflowError extends DecodeError {
  constructor(needed: number, available: number) {
    super(`Buffer underflow: needed ${needed} bytes, only ${available} available`);
    this.name = "BufferUnderflowError";
  }
}

/**
 * Error thrown when a type name is not registered.
 */
export class TypeNotRegisteredError extends ShapewiseError {
  constructor(typeName: string) {
    super(`Type not registered: ${typeName}`);
    this.name = "TypeNotRegisteredError";
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Runs `encode`, tagging any encode error that escapes it with `location`.
 */
export function withLocation<T>(location: Location, encode: () => T): T {
  try {
    return encode();
  } catch (e) {
    if (e instanceof EncodeError) {
      throw e.at(location);
    }
    throw e;
  }
}
