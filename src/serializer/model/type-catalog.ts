/**
 * Type catalog for the JS value model.
 * Maps constructors to qualified names and back, and builds the HostType
 * chains the graph writer walks.
 */

import { typeCatalogError } from "../errors";
import { ByteString } from "./ByteString";
import { NativeShape, type HostType } from "./types";

// Any class value, including abstract ones.
export type AnyConstructor = abstract new (...args: never[]) => unknown;

export type CatalogEntryKind = "class" | "module" | "struct";

export interface CatalogEntry {
  ctor: AnyConstructor;
  name: string;
  kind: CatalogEntryKind;
}

const builtin = (
  name: string,
  builtinShape: NativeShape,
  superclass?: HostType,
): HostType =>
  Object.freeze({ name, kind: "class", superclass, builtinShape });

const OBJECT_TYPE = builtin("Object", NativeShape.Object);

/** Built-in class per shape family. */
export const BUILTIN_TYPES: Readonly<Record<NativeShape, HostType>> =
  Object.freeze({
    [NativeShape.Nil]: builtin("NilClass", NativeShape.Nil, OBJECT_TYPE),
    [NativeShape.True]: builtin("TrueClass", NativeShape.True, OBJECT_TYPE),
    [NativeShape.False]: builtin("FalseClass", NativeShape.False, OBJECT_TYPE),
    [NativeShape.Fixnum]: builtin("Integer", NativeShape.Fixnum, OBJECT_TYPE),
    [NativeShape.Bignum]: builtin("Bignum", NativeShape.Bignum, OBJECT_TYPE),
    [NativeShape.Float]: builtin("Float", NativeShape.Float, OBJECT_TYPE),
    [NativeShape.String]: builtin("String", NativeShape.String, OBJECT_TYPE),
    [NativeShape.Array]: builtin("Array", NativeShape.Array, OBJECT_TYPE),
    [NativeShape.Hash]: builtin("Hash", NativeShape.Hash, OBJECT_TYPE),
    [NativeShape.Class]: builtin("Class", NativeShape.Class, OBJECT_TYPE),
    [NativeShape.Module]: builtin("Module", NativeShape.Module, OBJECT_TYPE),
    [NativeShape.Object]: OBJECT_TYPE,
    [NativeShape.BasicObject]: builtin("BasicObject", NativeShape.BasicObject),
    [NativeShape.Struct]: builtin("Struct", NativeShape.Struct, OBJECT_TYPE),
    [NativeShape.Regexp]: builtin("Regexp", NativeShape.Regexp, OBJECT_TYPE),
    [NativeShape.Symbol]: builtin("Symbol", NativeShape.Symbol, OBJECT_TYPE),
  });

const BUILTIN_TYPES_BY_NAME: ReadonlyMap<string, HostType> = new Map(
  Object.values(BUILTIN_TYPES).map((type): [string, HostType] => [
    type.name,
    type,
  ]),
);

const BUILTIN_CONSTRUCTORS: ReadonlyArray<readonly [unknown, HostType]> = [
  [Object, OBJECT_TYPE],
  [Array, BUILTIN_TYPES[NativeShape.Array]],
  [Map, BUILTIN_TYPES[NativeShape.Hash]],
  [ByteString, BUILTIN_TYPES[NativeShape.String]],
  [RegExp, BUILTIN_TYPES[NativeShape.Regexp]],
  [Function, BUILTIN_TYPES[NativeShape.Class]],
];

const constructorOf = (prototype: unknown): unknown =>
  typeof prototype === "object" && prototype !== null
    ? Reflect.get(prototype, "constructor")
    : undefined;

const prototypeOf = (ctor: unknown): unknown =>
  typeof ctor === "function" ? Reflect.get(ctor, "prototype") : undefined;

const nameOf = (ctor: unknown): string => {
  const name: unknown =
    typeof ctor === "function" ? Reflect.get(ctor, "name") : undefined;
  return typeof name === "string" ? name : "";
};

/**
 * Registry for class, module and struct names of the JS value model.
 */
export class TypeCatalog {
  private readonly entries = new Map<unknown, CatalogEntry>();
  private readonly byName = new Map<string, HostType>();
  private readonly resolvedTypes = new Map<unknown, HostType>();
  private anonymousCounter = 0;

  constructor() {
    this.registerBuiltInTypes();
  }

  /**
   * Register a subclass of a built-in container (Array, Map, ByteString) or
   * any other class under a qualified name such as `App::Stack`.
   */
  registerClass(ctor: AnyConstructor, name: string): void {
    this.addEntry({ ctor, name, kind: "class" });
  }

  /**
   * Register a class produced by a mixin application. Instances created from
   * it (or from a subclass of it) are dumped as extended by module `name`.
   */
  registerModule(ctor: AnyConstructor, name: string): void {
    this.addEntry({ ctor, name, kind: "module" });
  }

  /** Register a record-like class whose instances classify as structs. */
  registerStruct(ctor: AnyConstructor, name: string): void {
    this.addEntry({ ctor, name, kind: "struct" });
  }

  getEntries(): readonly CatalogEntry[] {
    return Array.from(this.entries.values());
  }

  /** Reverse lookup used to verify qualified names. */
  resolve(path: string): HostType | undefined {
    return this.byName.get(path) ?? BUILTIN_TYPES_BY_NAME.get(path);
  }

  /**
   * HostType for the class an object was created from, walking the
   * prototype chain of `prototype`.
   */
  typeForPrototype(prototype: unknown): HostType {
    if (prototype === null || prototype === undefined) {
      return OBJECT_TYPE;
    }
    return this.typeForConstructor(constructorOf(prototype));
  }

  typeForConstructor(ctor: unknown): HostType {
    const cached = this.resolvedTypes.get(ctor);
    if (cached) {
      return cached;
    }

    const parentPrototype: unknown = (() => {
      const prototype = prototypeOf(ctor);
      return typeof prototype === "object" && prototype !== null
        ? Object.getPrototypeOf(prototype)
        : null;
    })();
    const superclass =
      parentPrototype === null ? undefined : this.typeForPrototype(parentPrototype);

    const entry = this.entries.get(ctor);
    const type = entry
      ? this.typeForEntry(entry, superclass)
      : this.typeForUnregistered(ctor, superclass);
    this.resolvedTypes.set(ctor, type);
    return type;
  }

  /** True when the prototype chain contains a class registered as a struct. */
  isStructPrototype(prototype: unknown): boolean {
    let current: unknown = prototype;
    while (typeof current === "object" && current !== null) {
      const entry = this.entries.get(constructorOf(current));
      if (entry?.kind === "struct") {
        return true;
      }
      current = Object.getPrototypeOf(current);
    }
    return false;
  }

  private addEntry(entry: CatalogEntry): void {
    if (!entry.name || entry.name.startsWith("#")) {
      throw typeCatalogError(`Invalid type name "${entry.name}"`);
    }
    if (this.entries.has(entry.ctor)) {
      throw typeCatalogError(
        `Constructor "${nameOf(entry.ctor)}" is already registered`,
      );
    }
    if (this.byName.has(entry.name)) {
      throw typeCatalogError(`Type with name "${entry.name}" already exists`);
    }

    this.entries.set(entry.ctor, entry);
    // Chains built before this registration may now be stale.
    this.resolvedTypes.clear();
    this.registerBuiltInTypes();
    this.refreshNames();
  }

  private typeForEntry(
    entry: CatalogEntry,
    superclass: HostType | undefined,
  ): HostType {
    if (entry.kind === "module") {
      const module: HostType = Object.freeze({
        name: entry.name,
        kind: "module",
        superclass: undefined,
      });
      return Object.freeze({
        name: entry.name,
        kind: "class",
        superclass,
        includedModule: module,
      });
    }
    return Object.freeze({ name: entry.name, kind: "class", superclass });
  }

  private typeForUnregistered(
    ctor: unknown,
    superclass: HostType | undefined,
  ): HostType {
    const name = nameOf(ctor);
    if (name) {
      return Object.freeze({ name, kind: "class", superclass });
    }
    this.anonymousCounter += 1;
    return Object.freeze({
      name: `#<Class:0x${this.anonymousCounter.toString(16).padStart(4, "0")}>`,
      kind: "class",
      superclass,
    });
  }

  private registerBuiltInTypes(): void {
    for (const [ctor, type] of BUILTIN_CONSTRUCTORS) {
      this.resolvedTypes.set(ctor, type);
    }
  }

  private refreshNames(): void {
    for (const entry of this.entries.values()) {
      const type = this.typeForConstructor(entry.ctor);
      this.byName.set(entry.name, type.includedModule ?? type);
    }
  }
}
