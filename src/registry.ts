import { TypeNotRegisteredError } from "./errors";
import { BitOrder, BitStore, Field, PrimitiveKind, TypeResolver, TypeShape, VariantDef } from "./types";

/**
 * Numeric identifier of a type in a {@link TypeRegistry}.
 */
export type TypeId = number;

/**
 * Registration information for a type. A reserved type has no shape until
 * it is defined.
 */
interface TypeRegistration {
  typeId: TypeId;
  name?: string;
  shape?: TypeShape<TypeId>;
}

/**
 * Variant declaration accepted by {@link TypeRegistry.variant}. The index
 * defaults to the variant's position.
 */
export interface VariantSpec {
  name: string;
  index?: number;
  fields?: Field<TypeId>[];
}

/**
 * In-memory type resolver keyed by numeric ids.
 *
 * @example
 * ```typescript
 * const types = new TypeRegistry();
 * const point = types.composite([
 *   { name: "x", type: types.primitive("i32") },
 *   { name: "y", type: types.primitive("i32") },
 * ], "Point");
 * ```
 */
export class TypeRegistry implements TypeResolver<TypeId> {
  private byId: Map<TypeId, TypeRegistration> = new Map();
  private byName: Map<string, TypeRegistration> = new Map();
  private primitives: Map<PrimitiveKind, TypeId> = new Map();
  private nextTypeId: TypeId = 0;

  /**
   * Registers a shape and returns its new id.
   */
  register(shape: TypeShape<TypeId>, name?: string): TypeId {
    const id = this.reserve(name);
    this.define(id, shape);
    return id;
  }

  /**
   * Allocates an id without a shape, so that recursive types can refer to
   * themselves. The shape is supplied later with {@link define}.
   */
  reserve(name?: string): TypeId {
    const registration: TypeRegistration = { typeId: this.nextTypeId++, name };
    this.byId.set(registration.typeId, registration);
    if (name !== undefined) {
      this.byName.set(name, registration);
    }
    return registration.typeId;
  }

  /**
   * Sets the shape of a reserved id.
   */
  define(typeId: TypeId, shape: TypeShape<TypeId>): void {
    const reg = this.byId.get(typeId);
    if (!reg) {
      throw new TypeNotRegisteredError(`#${typeId}`);
    }
    reg.shape = shape;
  }

  resolve(typeId: TypeId): TypeShape<TypeId> | undefined {
    return this.byId.get(typeId)?.shape;
  }

  describe(typeId: TypeId): string {
    return this.byId.get(typeId)?.name ?? `#${typeId}`;
  }

  /**
   * Gets the type ID for a registered type name.
   */
  getTypeId(name: string): TypeId {
    const reg = this.byName.get(name);
    if (!reg) {
      throw new TypeNotRegisteredError(name);
    }
    return reg.typeId;
  }

  /**
   * Gets the name a type was registered under, if any.
   */
  getTypeName(typeId: TypeId): string | undefined {
    return this.byId.get(typeId)?.name;
  }

  /**
   * Checks if a type name is registered.
   */
  isRegistered(name: string): boolean {
    return this.byName.has(name);
  }

  get size(): number {
    return this.byId.size;
  }

  /**
   * Clears all registrations.
   */
  clear(): void {
    this.byId.clear();
    this.byName.clear();
    this.primitives.clear();
    this.nextTypeId = 0;
  }

  /**
   * The id of a primitive kind, registered on first use.
   */
  primitive(kind: PrimitiveKind): TypeId {
    const existing = this.primitives.get(kind);
    if (existing !== undefined) {
      return existing;
    }
    const id = this.register({ kind: "primitive", primitive: kind }, kind);
    this.primitives.set(kind, id);
    return id;
  }

  str(): TypeId {
    return this.register({ kind: "str" });
  }

  compact(inner: TypeId): TypeId {
    return this.register({ kind: "compact", inner });
  }

  composite(fields: Field<TypeId>[], name?: string): TypeId {
    return this.register({ kind: "composite", fields }, name);
  }

  tuple(elements: TypeId[]): TypeId {
    return this.register({ kind: "tuple", elements });
  }

  sequence(element: TypeId): TypeId {
    return this.register({ kind: "sequence", element });
  }

  array(element: TypeId, length: number): TypeId {
    return this.register({ kind: "array", element, length });
  }

  variant(variants: VariantSpec[], name?: string): TypeId {
    const defs: VariantDef<TypeId>[] = variants.map((v, idx) => ({
      name: v.name,
      index: v.index ?? idx,
      fields: v.fields ?? [],
    }));
    return this.register({ kind: "variant", variants: defs }, name);
  }

  bitSequence(order: BitOrder, store: BitStore): TypeId {
    return this.register({ kind: "bitSequence", order, store });
  }

  void(): TypeId {
    return this.register({ kind: "void" });
  }
}
