import type { Encoder } from "./encoder";
import { CustomError } from "./errors";
import { Field } from "./types";
import { Composite, EncodeAsFields, EncodeAsType, FieldValue, Variant, isEncodable } from "./values";
import { Writer } from "./writer";

/**
 * A field to read off a value: its key, optionally renamed on the way out or
 * skipped entirely.
 */
export type FieldSpec<T> =
  | (keyof T & string)
  | {
      key: keyof T & string;
      rename?: string;
      skip?: boolean;
    };

export interface RecordOptions {
  /** Emit the fields without names, so they match by position. */
  positional?: boolean;
}

interface NormalizedField {
  key: string;
  name: string;
  skip: boolean;
}

type LooseFieldSpec = string | { key: string; rename?: string; skip?: boolean };

function normalize(spec: LooseFieldSpec): NormalizedField {
  if (typeof spec === "string") {
    return { key: spec, name: spec, skip: false };
  }
  return { key: spec.key, name: spec.rename ?? spec.key, skip: spec.skip ?? false };
}

function readFields(value: object, fields: readonly NormalizedField[], positional: boolean): FieldValue[] {
  return fields.map((field) => {
    const name = positional ? undefined : field.name;
    if (field.skip) {
      return { name, value: undefined, skip: true };
    }
    const raw: unknown = Reflect.get(value, field.key);
    if (!isEncodable(raw)) {
      throw new CustomError(`Field ${field.key} holds a ${typeof raw}, which cannot be encoded`);
    }
    return { name, value: raw };
  });
}

/**
 * A record whose fields are read when it is encoded.
 */
export class DerivedRecord implements EncodeAsType, EncodeAsFields {
  constructor(
    private readonly value: object,
    private readonly fields: readonly NormalizedField[],
    private readonly positional: boolean,
  ) {}

  /**
   * The record's fields as a {@link Composite}.
   */
  toComposite(): Composite {
    return new Composite(readFields(this.value, this.fields, this.positional));
  }

  encodeAsTypeTo<Id>(typeId: Id, encoder: Encoder<Id>, out: Writer): void {
    encoder.encode(this.toComposite(), typeId, out);
  }

  encodeAsFieldsTo<Id>(fields: readonly Field<Id>[], encoder: Encoder<Id>, out: Writer): void {
    encoder.encodeFields(this.toComposite(), fields, out);
  }
}

/**
 * Builds an encodable view of a record type from its field list.
 *
 * @example
 * ```typescript
 * interface User { id: number; name: string; password: string }
 * const user = deriveRecord<User>(["id", { key: "name", rename: "username" }, { key: "password", skip: true }]);
 * encodeAsType(user(alice), userType, types);
 * ```
 */
export function deriveRecord<T extends object>(
  fields: readonly FieldSpec<T>[],
  options: RecordOptions = {},
): (value: T) => DerivedRecord {
  const normalized = fields.map(normalize);
  const positional = options.positional ?? false;
  return (value) => new DerivedRecord(value, normalized, positional);
}

/**
 * How one member of a tagged union encodes.
 */
export interface UnionVariantSpec<T> {
  /** Index matched when no target variant has the variant's name. Default: position in `variants`. */
  index?: number;
  /** Variant name to match against; defaults to the tag value. */
  rename?: string;
  positional?: boolean;
  fields?: readonly FieldSpec<T>[];
}

/**
 * One entry per tag value of `T`.
 */
export type UnionVariants<T, K extends keyof T> = {
  [N in T[K] & string]: UnionVariantSpec<Extract<T, Record<K, N>>>;
};

// UnionVariantSpec with the member type erased
interface LooseVariantSpec {
  index?: number;
  rename?: string;
  positional?: boolean;
  fields?: readonly LooseFieldSpec[];
}

interface NormalizedVariant {
  name: string;
  index: number;
  positional: boolean;
  fields: NormalizedField[];
}

/**
 * A union member whose active variant and fields are read when it is
 * encoded.
 */
export class DerivedVariant implements EncodeAsType {
  constructor(
    private readonly value: object,
    private readonly tag: string,
    private readonly variants: ReadonlyMap<string, NormalizedVariant>,
  ) {}

  /**
   * The active member as a {@link Variant}.
   */
  toVariant(): Variant {
    const tagValue: unknown = Reflect.get(this.value, this.tag);
    const spec = typeof tagValue === "string" ? this.variants.get(tagValue) : undefined;
    if (spec === undefined) {
      throw new CustomError(`No variant is declared for ${this.tag} ${String(tagValue)}`);
    }
    return new Variant(spec.name, readFields(this.value, spec.fields, spec.positional), spec.index);
  }

  encodeAsTypeTo<Id>(typeId: Id, encoder: Encoder<Id>, out: Writer): void {
    encoder.encode(this.toVariant(), typeId, out);
  }
}

/**
 * Builds an encodable view of a tagged union, keyed by the value of its tag
 * property.
 *
 * @example
 * ```typescript
 * type Shape = { kind: "circle"; r: number } | { kind: "square"; side: number };
 * const shape = deriveUnion<Shape, "kind">("kind", {
 *   circle: { rename: "Circle", fields: ["r"] },
 *   square: { rename: "Square", fields: ["side"] },
 * });
 * ```
 */
export function deriveUnion<T extends object, K extends keyof T & string>(
  tag: K,
  variants: UnionVariants<T, K>,
): (value: T) => DerivedVariant;
export function deriveUnion(
  tag: string,
  variants: Readonly<Record<string, LooseVariantSpec>>,
): (value: object) => DerivedVariant {
  const normalized = new Map<string, NormalizedVariant>();
  Object.entries(variants).forEach(([tagValue, spec], idx) => {
    normalized.set(tagValue, {
      name: spec.rename ?? tagValue,
      index: spec.index ?? idx,
      positional: spec.positional ?? false,
      fields: (spec.fields ?? []).map(normalize),
    });
  });
  return (value) => new DerivedVariant(value, tag, normalized);
}
