import type { Encoder } from "./encoder";
import { Field } from "./types";
import { Writer } from "./writer";

/**
 * A value that knows how to encode itself into a target type.
 *
 * The encoder calls it before looking at the target's shape and takes its
 * outcome as final. Implementations recurse through `encoder.encode` and
 * report their own failures with `EncodeError.custom`.
 */
export interface EncodeAsType {
  encodeAsTypeTo<Id>(typeId: Id, encoder: Encoder<Id>, out: Writer): void;
}

/**
 * A value that can encode itself against a list of target fields, such as a
 * record or the payload of a variant.
 */
export interface EncodeAsFields {
  encodeAsFieldsTo<Id>(fields: readonly Field<Id>[], encoder: Encoder<Id>, out: Writer): void;
}

/**
 * Anything the encoder accepts.
 *
 * Plain records are field-bearing values matched by name; arrays double as
 * sequences and tuples; `null` and `undefined` are the unit value.
 */
export type Encodable =
  | boolean
  | number
  | bigint
  | string
  | null
  | undefined
  | Uint8Array
  | readonly Encodable[]
  | ReadonlySet<Encodable>
  | ReadonlyMap<string, Encodable>
  | Composite
  | Variant
  | Bits
  | Char
  | EncodeAsType
  | EncodeAsFields
  | EncodableRecord;

export type EncodableRecord = { readonly [key: string]: Encodable };

/**
 * One field of a source value. Skipped fields are ignored when matching.
 */
export interface FieldValue {
  readonly name?: string;
  readonly value: Encodable;
  readonly skip?: boolean;
}

/**
 * An ordered list of named or unnamed fields.
 *
 * @example
 * ```typescript
 * const point = Composite.named({ x: 1, y: 2 });
 * const pair = Composite.unnamed([1, "one"]);
 * ```
 */
export class Composite implements EncodeAsFields {
  readonly fields: readonly FieldValue[];

  constructor(fields: Iterable<FieldValue>) {
    this.fields = Array.from(fields);
  }

  static named(record: EncodableRecord): Composite {
    return new Composite(Object.entries(record).map(([name, value]) => ({ name, value })));
  }

  static unnamed(values: Iterable<Encodable>): Composite {
    return new Composite(Array.from(values, (value) => ({ value })));
  }

  encodeAsFieldsTo<Id>(fields: readonly Field<Id>[], encoder: Encoder<Id>, out: Writer): void {
    encoder.encodeFields(this, fields, out);
  }
}

/**
 * A tagged value: the name of the active variant and its fields.
 *
 * `index` is only consulted when no target variant has the same name.
 */
export class Variant {
  readonly fields: Composite;

  constructor(
    readonly name: string,
    fields: Iterable<FieldValue> | Composite = [],
    readonly index?: number,
  ) {
    this.fields = fields instanceof Composite ? fields : new Composite(fields);
  }
}

/**
 * An ordered sequence of booleans, encoded as a bit-sequence.
 */
export class Bits {
  readonly bits: readonly boolean[];

  constructor(bits: Iterable<boolean>) {
    this.bits = Array.from(bits);
  }

  /**
   * Parses a string of `0` and `1` characters, first bit first.
   */
  static fromString(bits: string): Bits {
    if (!/^[01]*$/.test(bits)) {
      throw new RangeError(`Bit string may only contain 0 and 1: ${bits}`);
    }
    return new Bits(Array.from(bits, (c) => c === "1"));
  }
}

/**
 * A single Unicode character. JavaScript has no char type, so strings that
 * should encode as chars are wrapped in this.
 */
export class Char {
  readonly codePoint: number;

  constructor(char: string) {
    const points = Array.from(char);
    if (points.length !== 1) {
      throw new RangeError(`Char must hold exactly one code point, got ${JSON.stringify(char)}`);
    }
    this.codePoint = points[0].codePointAt(0) ?? 0;
  }

  toString(): string {
    return String.fromCodePoint(this.codePoint);
  }
}

/**
 * Builds a variant from positional values or a record of named values.
 */
export function variant(
  name: string,
  fields: readonly Encodable[] | EncodableRecord = [],
  index?: number,
): Variant {
  return new Variant(name, toFieldValues(fields), index);
}

export function some(value: Encodable): Variant {
  return new Variant("Some", [{ value }]);
}

export function none(): Variant {
  return new Variant("None");
}

export function ok(value: Encodable): Variant {
  return new Variant("Ok", [{ value }]);
}

export function err(error: Encodable): Variant {
  return new Variant("Err", [{ value: error }]);
}

function toFieldValues(fields: readonly Encodable[] | EncodableRecord): FieldValue[] {
  if (isEncodableArray(fields)) {
    return fields.map((value) => ({ value }));
  }
  return Object.entries(fields).map(([name, value]) => ({ name, value }));
}

/**
 * What the encoder sees once a value has been classified.
 */
export type Source =
  | { kind: "bool"; value: boolean }
  | { kind: "number"; value: number | bigint }
  | { kind: "char"; codePoint: number }
  | { kind: "str"; value: string }
  | { kind: "bytes"; value: Uint8Array }
  | { kind: "sequence"; items: readonly Encodable[] }
  | { kind: "composite"; fields: readonly FieldValue[] }
  | { kind: "map"; entries: ReadonlyMap<string, Encodable> }
  | { kind: "variant"; variant: Variant }
  | { kind: "bits"; bits: readonly boolean[] }
  | { kind: "fields"; value: EncodeAsFields }
  | { kind: "custom"; hook: EncodeAsType };

const UNIT: Source = { kind: "composite", fields: [] };

export function classify(value: Encodable): Source {
  if (typeof value === "boolean") {
    return { kind: "bool", value };
  }
  if (typeof value === "number" || typeof value === "bigint") {
    return { kind: "number", value };
  }
  if (typeof value === "string") {
    return { kind: "str", value };
  }
  if (value === null || value === undefined) {
    return UNIT;
  }
  if (isEncodeAsType(value)) {
    return { kind: "custom", hook: value };
  }
  if (value instanceof Uint8Array) {
    return { kind: "bytes", value };
  }
  if (isEncodableArray(value)) {
    return { kind: "sequence", items: value };
  }
  if (isEncodableSet(value)) {
    return { kind: "sequence", items: Array.from(value) };
  }
  if (isEncodableMap(value)) {
    return { kind: "map", entries: value };
  }
  if (value instanceof Composite) {
    return { kind: "composite", fields: value.fields };
  }
  if (value instanceof Variant) {
    return { kind: "variant", variant: value };
  }
  if (value instanceof Bits) {
    return { kind: "bits", bits: value.bits };
  }
  if (value instanceof Char) {
    return { kind: "char", codePoint: value.codePoint };
  }
  if (isEncodeAsFields(value)) {
    return { kind: "fields", value };
  }
  return {
    kind: "composite",
    fields: Object.entries(value).map(([name, field]) => ({ name, value: field })),
  };
}

/**
 * Fields of a composite-like source that take part in matching.
 */
export function liveFields(fields: readonly FieldValue[]): FieldValue[] {
  return fields.filter((f) => !f.skip);
}

/**
 * The source's fields, for sources that have them.
 */
export function fieldsOf(source: Source): readonly FieldValue[] | undefined {
  switch (source.kind) {
    case "composite":
      return liveFields(source.fields);
    case "map":
      return Array.from(source.entries, ([name, value]) => ({ name, value }));
    default:
      return undefined;
  }
}

export function isUnit(source: Source): boolean {
  return source.kind === "composite" && liveFields(source.fields).length === 0;
}

/**
 * Short description of a source value for error messages.
 */
export function describeSource(source: Source): string {
  switch (source.kind) {
    case "bool":
      return "bool";
    case "number":
      return `number ${source.value}`;
    case "char":
      return "char";
    case "str":
      return "str";
    case "bytes":
    case "sequence":
      return "sequence";
    case "composite": {
      const live = liveFields(source.fields);
      if (live.length === 0) {
        return "unit";
      }
      return live.every((f) => f.name !== undefined) ? "struct" : "tuple";
    }
    case "map":
      return "map";
    case "variant":
      return `variant ${source.variant.name}`;
    case "bits":
      return "bit sequence";
    case "fields":
      return "struct";
    case "custom":
      return "custom value";
  }
}

/**
 * Shallow check that a value read by reflection is something the encoder
 * accepts: anything but functions and symbols.
 */
export function isEncodable(value: unknown): value is Encodable {
  return typeof value !== "function" && typeof value !== "symbol";
}

function isEncodableArray(value: object): value is readonly Encodable[] {
  return Array.isArray(value);
}

function isEncodableSet(value: object): value is ReadonlySet<Encodable> {
  return value instanceof Set;
}

function isEncodableMap(value: object): value is ReadonlyMap<string, Encodable> {
  return value instanceof Map;
}

export function isEncodeAsType(value: object): value is EncodeAsType {
  return "encodeAsTypeTo" in value && typeof value.encodeAsTypeTo === "function";
}

export function isEncodeAsFields(value: object): value is EncodeAsFields {
  return "encodeAsFieldsTo" in value && typeof value.encodeAsFieldsTo === "function";
}
