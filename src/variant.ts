import { encodeFieldValues } from "./composite";
import type { Encoder } from "./encoder";
import { CannotFindVariantError, UnsupportedError, withLocation } from "./errors";
import { variantLocation } from "./location";
import { VariantDef } from "./types";
import { Variant } from "./values";
import { Writer } from "./writer";

/**
 * Finds the target variant for `source` by name. Only a target whose
 * variants are all unnamed is matched by the source's index instead.
 */
export function findVariant<Id>(source: Variant, variants: readonly VariantDef<Id>[]): VariantDef<Id> | undefined {
  if (variants.some((v) => v.name !== "")) {
    return variants.find((v) => v.name === source.name);
  }
  const index = source.index;
  if (index === undefined) {
    return undefined;
  }
  return variants.find((v) => v.index === index);
}

/**
 * Encodes a variant source: the target's index byte, then the variant's
 * fields against the target variant's fields.
 */
export function encodeVariant<Id>(
  source: Variant,
  variants: readonly VariantDef<Id>[],
  typeId: Id,
  encoder: Encoder<Id>,
  out: Writer,
): boolean {
  const target = findVariant(source, variants);
  if (target === undefined) {
    throw new CannotFindVariantError(source.name, encoder.describe(typeId));
  }
  if (!Number.isInteger(target.index) || target.index < 0 || target.index > 0xff) {
    throw new UnsupportedError(encoder.describe(typeId), `variant index ${target.index} does not fit in a byte`);
  }

  withLocation(variantLocation(source.name), () => {
    out.writeVariantIndex(target.index);
    encodeFieldValues(source.fields.fields, target.fields, encoder, out);
  });
  return true;
}
