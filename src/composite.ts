import type { Encoder } from "./encoder";
import {
  CannotFindFieldError,
  CustomError,
  DuplicateFieldError,
  EncodeError,
  WrongLengthError,
  describeCause,
  withLocation,
} from "./errors";
import { elementLocation, fieldLocation, indexLocation } from "./location";
import { Field } from "./types";
import { Encodable, EncodeAsFields, FieldValue, Source, fieldsOf, liveFields } from "./values";
import { Writer } from "./writer";

/**
 * Lines source fields up with target fields and encodes each pair.
 *
 * Fields are matched by name when every target field is named and every
 * source field is named (or both sides are empty); otherwise by position.
 * Skipped source fields take no part in either.
 */
export function encodeFieldValues<Id>(
  source: readonly FieldValue[],
  target: readonly Field<Id>[],
  encoder: Encoder<Id>,
  out: Writer,
): void {
  const live = liveFields(source);
  if (matchesByName(live, target)) {
    encodeByName(live, target, encoder, out);
  } else {
    encodeByPosition(live, target, encoder, out);
  }
}

function matchesByName<Id>(live: readonly FieldValue[], target: readonly Field<Id>[]): boolean {
  const targetNamed = target.every((f) => f.name !== undefined);
  const sourceNamed = live.every((f) => f.name !== undefined);
  const bothEmpty = live.length === 0 && target.length === 0;
  return targetNamed && sourceNamed && (live.length > 0 || bothEmpty);
}

// Whether the source fields line up with a one-field target, or belong to
// the type it wraps.
function fillsSingleField<Id>(source: readonly FieldValue[], field: Field<Id>): boolean {
  const live = liveFields(source);
  if (matchesByName(live, [field])) {
    return live.some((f) => f.name === field.name);
  }
  return live.length === 1;
}

function encodeByName<Id>(
  source: readonly FieldValue[],
  target: readonly Field<Id>[],
  encoder: Encoder<Id>,
  out: Writer,
): void {
  const byName = new Map<string, Encodable>();
  for (const field of source) {
    const name = field.name ?? "";
    if (byName.has(name)) {
      throw new DuplicateFieldError(name);
    }
    byName.set(name, field.value);
  }

  // resolve every target field before writing anything
  const pairs = target.map((field) => {
    const name = field.name ?? "";
    if (!byName.has(name)) {
      throw new CannotFindFieldError(name);
    }
    return { name, value: byName.get(name), type: field.type };
  });

  if (source.length > target.length && !encoder.allowUnusedFields) {
    throw new WrongLengthError(source.length, target.length);
  }

  for (const { name, value, type } of pairs) {
    withLocation(fieldLocation(name), () => encoder.encode(value, type, out));
  }
}

function encodeByPosition<Id>(
  source: readonly FieldValue[],
  target: readonly Field<Id>[],
  encoder: Encoder<Id>,
  out: Writer,
): void {
  if (source.length !== target.length) {
    throw new WrongLengthError(source.length, target.length);
  }

  source.forEach((field, idx) => {
    withLocation(elementLocation(idx, field.name), () => encoder.encode(field.value, target[idx].type, out));
  });
}

/**
 * Calls a foreign {@link EncodeAsFields} implementation, turning anything
 * but an encode error into a {@link CustomError}.
 */
export function runFieldsHook<Id>(
  hook: EncodeAsFields,
  target: readonly Field<Id>[],
  encoder: Encoder<Id>,
  out: Writer,
): void {
  try {
    hook.encodeAsFieldsTo(target, encoder, out);
  } catch (e) {
    if (e instanceof EncodeError) {
      throw e;
    }
    throw new CustomError(describeCause(e), { cause: e });
  }
}

/**
 * Encodes a field-bearing source into a composite (or tuple) target with the
 * given fields.
 *
 * A source made of one unnamed element is unwrapped when the target does
 * not have exactly one field, so `(x,)` encodes like `x`. A sequence lines
 * up with the fields by position. A one-field target whose field the source
 * does not fill is left to the caller, which encodes the whole source into
 * the wrapped type.
 *
 * @returns false when the source has no fields to offer the target; the
 *          caller then tries the single-field fallbacks
 */
export function encodeIntoFields<Id>(
  source: Source,
  target: readonly Field<Id>[],
  typeId: Id,
  encoder: Encoder<Id>,
  out: Writer,
): boolean {
  if (source.kind === "fields") {
    runFieldsHook(source.value, target, encoder, out);
    return true;
  }

  if (source.kind === "sequence" || source.kind === "bytes") {
    const items: readonly Encodable[] = source.kind === "bytes" ? Array.from(source.value) : source.items;
    if (items.length !== target.length) {
      if (target.length === 1) {
        return false;
      }
      throw new WrongLengthError(items.length, target.length);
    }
    encodeByPosition(items.map((value) => ({ value })), target, encoder, out);
    return true;
  }

  const fields = fieldsOf(source);
  if (fields === undefined) {
    return false;
  }

  if (fields.length === 1 && fields[0].name === undefined && target.length !== 1) {
    const only = fields[0].value;
    withLocation(indexLocation(0), () => encoder.encode(only, typeId, out));
    return true;
  }

  if (target.length === 1 && !fillsSingleField(fields, target[0])) {
    return false;
  }

  encodeFieldValues(fields, target, encoder, out);
  return true;
}
