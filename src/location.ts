/**
 * One step on the way from the root value to the place an encode failed.
 */
export type Location =
  | { readonly kind: "field"; readonly name: string }
  | { readonly kind: "variant"; readonly name: string }
  | { readonly kind: "index"; readonly index: number };

export function fieldLocation(name: string): Location {
  return { kind: "field", name };
}

export function variantLocation(name: string): Location {
  return { kind: "variant", name };
}

export function indexLocation(index: number): Location {
  return { kind: "index", index };
}

/**
 * Location for the element at `index`, preferring its name when it has one.
 */
export function elementLocation(index: number, name?: string): Location {
  return name === undefined ? indexLocation(index) : fieldLocation(name);
}

/**
 * Renders a root-first path as `.field[2](Variant)`.
 */
export function formatPath(path: readonly Location[]): string {
  let out = "";
  for (const loc of path) {
    switch (loc.kind) {
      case "field":
        out += `.${loc.name}`;
        break;
      case "variant":
        out += `(${loc.name})`;
        break;
      case "index":
        out += `[${loc.index}]`;
        break;
    }
  }
  return out;
}
