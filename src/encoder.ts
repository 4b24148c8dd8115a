import { encodeArray, encodeSequence, encodeTuple } from "./aggregate";
import { encodeBits } from "./bits";
import { encodeFieldValues, encodeIntoFields, runFieldsHook } from "./composite";
import {
  CustomError,
  EncodeError,
  RecursionLimitExceededError,
  TypeNotFoundError,
  TypeResolvingError,
  UnsupportedError,
  WrongShapeError,
  describeCause,
  withLocation,
} from "./errors";
import { elementLocation } from "./location";
import { encodeCompact, encodePrimitive, encodeStr } from "./primitive";
import { Field, TypeResolver, TypeShape, describeShape, singleInnerType } from "./types";
import {
  Encodable,
  EncodeAsType,
  Source,
  classify,
  describeSource,
  isEncodeAsFields,
  isUnit,
  liveFields,
} from "./values";
import { encodeVariant } from "./variant";
import { Writer } from "./writer";

/** Deepest the encoder follows the target type graph by default. */
export const DEFAULT_MAX_DEPTH = 512;

/**
 * Options for a single encode call.
 */
export interface EncodeOptions {
  /** Maximum nesting of target types. Default: 512 */
  maxDepth?: number;
  /** Let named source fields the target does not ask for pass silently. Default: false */
  allowUnusedFields?: boolean;
}

function formatTypeId(typeId: unknown): string {
  if (typeof typeId !== "object" || typeId === null) {
    return String(typeId);
  }
  try {
    return JSON.stringify(typeId);
  } catch (e) {
    return `${String(typeId)} (${describeCause(e)})`;
  }
}

/**
 * The state of one encode call: the resolver, the options, and how deep the
 * call currently is in the target type graph.
 *
 * Custom hooks receive the encoder and recurse through {@link encode}.
 */
export class Encoder<Id> {
  readonly maxDepth: number;
  readonly allowUnusedFields: boolean;
  private currentDepth = 0;

  constructor(
    readonly types: TypeResolver<Id>,
    options: EncodeOptions = {},
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.allowUnusedFields = options.allowUnusedFields ?? false;
  }

  /**
   * Number of encode frames currently open.
   */
  get depth(): number {
    return this.currentDepth;
  }

  /**
   * Encodes `value` into the type `typeId`, appending to `out`.
   */
  encode(value: Encodable, typeId: Id, out: Writer): void {
    if (this.currentDepth >= this.maxDepth) {
      throw new RecursionLimitExceededError(this.maxDepth);
    }
    this.currentDepth++;
    try {
      this.dispatch(value, typeId, out);
    } finally {
      this.currentDepth--;
    }
  }

  /**
   * Encodes a field-bearing value against a list of target fields.
   */
  encodeFields(value: Encodable, fields: readonly Field<Id>[], out: Writer): void {
    const source = classify(value);
    switch (source.kind) {
      case "composite":
        encodeFieldValues(source.fields, fields, this, out);
        return;
      case "map":
        encodeFieldValues(
          Array.from(source.entries, ([name, item]) => ({ name, value: item })),
          fields,
          this,
          out,
        );
        return;
      case "sequence":
        encodeFieldValues(
          source.items.map((item) => ({ value: item })),
          fields,
          this,
          out,
        );
        return;
      case "bytes":
        encodeFieldValues(
          Array.from(source.value, (item) => ({ value: item })),
          fields,
          this,
          out,
        );
        return;
      case "fields":
        runFieldsHook(source.value, fields, this, out);
        return;
      case "custom":
        if (isEncodeAsFields(source.hook)) {
          runFieldsHook(source.hook, fields, this, out);
          return;
        }
        break;
      default:
        break;
    }
    throw new WrongShapeError(describeSource(source), `${fields.length} field(s)`);
  }

  /**
   * Resolves a type id to its shape.
   * @throws TypeNotFoundError if the resolver does not know the id
   * @throws TypeResolvingError if the resolver throws
   */
  resolve(typeId: Id): TypeShape<Id> {
    let shape: TypeShape<Id> | undefined;
    try {
      shape = this.types.resolve(typeId);
    } catch (e) {
      throw new TypeResolvingError(this.describe(typeId), e);
    }
    if (shape === undefined) {
      throw new TypeNotFoundError(this.describe(typeId));
    }
    return shape;
  }

  /**
   * Name of a type for error messages.
   */
  describe(typeId: Id): string {
    return this.types.describe?.(typeId) ?? formatTypeId(typeId);
  }

  /**
   * Follows composites of one field and tuples of one element down to the
   * type they wrap.
   */
  unwrapSingle(typeId: Id): Id {
    let id = typeId;
    for (let i = 0; i < this.maxDepth; i++) {
      const inner = singleInnerType(this.resolve(id));
      if (inner === undefined) {
        return id;
      }
      id = inner;
    }
    throw new RecursionLimitExceededError(this.maxDepth);
  }

  private dispatch(value: Encodable, typeId: Id, out: Writer): void {
    const source = classify(value);
    if (source.kind === "custom") {
      this.runHook(source.hook, typeId, out);
      return;
    }

    const shape = this.resolve(typeId);
    if (this.encodeShape(source, shape, typeId, out)) {
      return;
    }

    const inner = singleInnerType(shape);
    if (inner !== undefined) {
      this.encode(value, inner, out);
      return;
    }

    if (source.kind === "composite") {
      const live = liveFields(source.fields);
      if (live.length === 1) {
        const only = live[0];
        withLocation(elementLocation(0, only.name), () => this.encode(only.value, typeId, out));
        return;
      }
    }

    throw new WrongShapeError(describeSource(source), `${this.describe(typeId)} (${describeShape(shape)})`);
  }

  private encodeShape(source: Source, shape: TypeShape<Id>, typeId: Id, out: Writer): boolean {
    switch (shape.kind) {
      case "primitive":
        return encodePrimitive(source, shape.primitive, typeId, this, out);
      case "str":
        return encodeStr(source, out);
      case "compact":
        return encodeCompact(source, shape.inner, this, out);
      case "composite":
        return encodeIntoFields(source, shape.fields, typeId, this, out);
      case "tuple":
        return encodeTuple(source, shape.elements, typeId, this, out);
      case "sequence":
        return encodeSequence(source, shape.element, this, out);
      case "array":
        return encodeArray(source, shape.element, shape.length, this, out);
      case "variant":
        return source.kind === "variant" && encodeVariant(source.variant, shape.variants, typeId, this, out);
      case "bitSequence":
        return encodeBits(source, shape.order, shape.store, out);
      case "void":
        if (!isUnit(source)) {
          throw new UnsupportedError(this.describe(typeId), `${describeSource(source)} has no void encoding`);
        }
        return true;
      default: {
        const kind: unknown = Reflect.get(shape, "kind");
        throw new UnsupportedError(this.describe(typeId), `unknown shape kind ${String(kind)}`);
      }
    }
  }

  private runHook(hook: EncodeAsType, typeId: Id, out: Writer): void {
    try {
      hook.encodeAsTypeTo(typeId, this, out);
    } catch (e) {
      if (e instanceof EncodeError) {
        throw e;
      }
      throw new CustomError(describeCause(e), { cause: e });
    }
  }
}

/**
 * Encodes `value` into the type `typeId`, appending the bytes to `out`.
 *
 * On failure `out` may hold a partial encoding and should be discarded.
 *
 * @example
 * ```typescript
 * const types = new TypeRegistry();
 * const u8 = types.primitive("u8");
 * const out = new Writer();
 * encodeAsTypeTo(7, u8, types, out);
 * ```
 */
export function encodeAsTypeTo<Id>(
  value: Encodable,
  typeId: Id,
  types: TypeResolver<Id>,
  out: Writer,
  options?: EncodeOptions,
): void {
  new Encoder(types, options).encode(value, typeId, out);
}

/**
 * Encodes `value` into the type `typeId` and returns the bytes.
 */
export function encodeAsType<Id>(
  value: Encodable,
  typeId: Id,
  types: TypeResolver<Id>,
  options?: EncodeOptions,
): Uint8Array {
  const out = new Writer();
  encodeAsTypeTo(value, typeId, types, out, options);
  return out.bytes().slice();
}

/**
 * Encodes a field-bearing value against `fields`, appending to `out`.
 */
export function encodeAsFieldsTo<Id>(
  value: Encodable,
  fields: readonly Field<Id>[],
  types: TypeResolver<Id>,
  out: Writer,
  options?: EncodeOptions,
): void {
  new Encoder(types, options).encodeFields(value, fields, out);
}

/**
 * Encodes a field-bearing value against `fields` and returns the bytes.
 */
export function encodeAsFields<Id>(
  value: Encodable,
  fields: readonly Field<Id>[],
  types: TypeResolver<Id>,
  options?: EncodeOptions,
): Uint8Array {
  const out = new Writer();
  encodeAsFieldsTo(value, fields, types, out, options);
  return out.bytes().slice();
}

/**
 * Unnamed fields for a list of bare type ids.
 */
export function fieldsFromIds<Id>(ids: Iterable<Id>): Field<Id>[] {
  return Array.from(ids, (type) => ({ type }));
}
