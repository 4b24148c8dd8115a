import { encodeIntoFields } from "./composite";
import type { Encoder } from "./encoder";
import { WrongLengthError, withLocation } from "./errors";
import { Location, elementLocation, fieldLocation, indexLocation } from "./location";
import { Encodable, Source, classify, liveFields } from "./values";
import { Writer } from "./writer";

interface Element {
  value: Encodable;
  location: Location;
}

const NESTED_KINDS: ReadonlySet<Source["kind"]> = new Set<Source["kind"]>([
  "sequence",
  "bytes",
  "map",
  "composite",
]);

/**
 * The elements of a source that can stand in for a sequence or array, or
 * undefined if it has none.
 *
 * A composite holding a single nested aggregate yields nothing so that the
 * caller falls back to encoding that aggregate instead.
 */
function elementsOf(source: Source): Element[] | undefined {
  switch (source.kind) {
    case "sequence":
      return source.items.map((value, idx) => ({ value, location: indexLocation(idx) }));
    case "bytes":
      return Array.from(source.value, (value, idx) => ({ value, location: indexLocation(idx) }));
    case "bits":
      return source.bits.map((value, idx) => ({ value, location: indexLocation(idx) }));
    case "map":
      return Array.from(source.entries, ([name, value]) => ({ value, location: fieldLocation(name) }));
    case "composite": {
      const live = liveFields(source.fields);
      if (live.length === 1 && NESTED_KINDS.has(classify(live[0].value).kind)) {
        return undefined;
      }
      return live.map((field, idx) => ({ value: field.value, location: elementLocation(idx, field.name) }));
    }
    default:
      return undefined;
  }
}

function isByteElement<Id>(element: Id, encoder: Encoder<Id>): boolean {
  const shape = encoder.resolve(element);
  return shape.kind === "primitive" && shape.primitive === "u8";
}

function encodeElements<Id>(elements: readonly Element[], element: Id, encoder: Encoder<Id>, out: Writer): void {
  for (const { value, location } of elements) {
    withLocation(location, () => encoder.encode(value, element, out));
  }
}

/**
 * Encodes a source into `sequence(element)`: compact length, then each
 * element.
 *
 * @returns false when the source has no elements to offer
 */
export function encodeSequence<Id>(source: Source, element: Id, encoder: Encoder<Id>, out: Writer): boolean {
  if (source.kind === "bytes" && isByteElement(element, encoder)) {
    out.writeLengthPrefixedBytes(source.value);
    return true;
  }

  const elements = elementsOf(source);
  if (elements === undefined) {
    return false;
  }
  out.writeSequenceLength(elements.length);
  encodeElements(elements, element, encoder, out);
  return true;
}

/**
 * Encodes a source into `array(element, length)`. Arrays carry no length
 * prefix, so the source must have exactly `length` elements.
 *
 * @returns false when the source has no elements to offer
 */
export function encodeArray<Id>(
  source: Source,
  element: Id,
  length: number,
  encoder: Encoder<Id>,
  out: Writer,
): boolean {
  if (source.kind === "bytes" && isByteElement(element, encoder)) {
    if (source.value.length !== length) {
      throw new WrongLengthError(source.value.length, length);
    }
    out.writeBytes(source.value);
    return true;
  }

  const elements = elementsOf(source);
  if (elements === undefined) {
    return false;
  }
  if (elements.length !== length) {
    throw new WrongLengthError(elements.length, length);
  }
  encodeElements(elements, element, encoder, out);
  return true;
}

/**
 * Encodes a source into `tuple(elements)`.
 *
 * Elements line up by position. A tuple of one element whose type is a
 * sequence or array hands the whole source to that element.
 *
 * @returns false when the source has to be unwrapped or passed whole into
 *          a one-element tuple
 */
export function encodeTuple<Id>(
  source: Source,
  elements: readonly Id[],
  typeId: Id,
  encoder: Encoder<Id>,
  out: Writer,
): boolean {
  if (source.kind === "sequence" || source.kind === "bytes") {
    const length = source.kind === "bytes" ? source.value.length : source.items.length;
    if (length !== elements.length) {
      if (elements.length === 1 && takesWholeSource(elements[0], encoder)) {
        return false;
      }
      throw new WrongLengthError(length, elements.length);
    }
  }

  return encodeIntoFields(
    source,
    elements.map((type) => ({ type })),
    typeId,
    encoder,
    out,
  );
}

function takesWholeSource<Id>(element: Id, encoder: Encoder<Id>): boolean {
  const kind = encoder.resolve(encoder.unwrapSingle(element)).kind;
  return kind === "sequence" || kind === "array";
}
