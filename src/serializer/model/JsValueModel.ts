import { classifyJsValue, isPlainRecord } from "../type-classifier";
import { BYTE_STRING_FIELDS, ByteString } from "./ByteString";
import { BUILTIN_TYPES, TypeCatalog } from "./type-catalog";
import {
  NativeShape,
  UTF8_ENCODING,
  type HostType,
  type Shape,
  type ValueModel,
  type VariableEntry,
} from "./types";

const ARRAY_INDEX_PATTERN = /^(?:0|[1-9]\d*)$/;

const ownEnumerableEntries = (value: object): Array<[string, unknown]> =>
  Object.keys(value).map((key): [string, unknown] => [
    key,
    Reflect.get(value, key),
  ]);

/**
 * ValueModel over plain JS values.
 *
 * Instance variables are the own enumerable properties of arrays, Maps,
 * ByteStrings and class instances (named `@key`); own function-valued
 * properties make the value's type a singleton carrying state.
 */
export class JsValueModel implements ValueModel<unknown> {
  constructor(public readonly catalog: TypeCatalog = new TypeCatalog()) {}

  classify(value: unknown): Shape<unknown> {
    return classifyJsValue(value, this.catalog);
  }

  typeOf(value: unknown): HostType {
    const base = this.baseTypeOf(value);
    if (this.hasOwnMethods(value)) {
      return Object.freeze({
        name: `#<Class:${base.name}>`,
        kind: "class",
        superclass: base,
        singleton: Object.freeze({ hasState: true }),
      });
    }
    return base;
  }

  identityOf(value: unknown): object | undefined {
    if (typeof value === "object" && value !== null) {
      return value;
    }
    if (typeof value === "function") {
      return value;
    }
    return undefined;
  }

  variablesOf(value: unknown): ReadonlyArray<VariableEntry<unknown>> {
    return this.ownProperties(value)
      .filter(([, entry]) => typeof entry !== "function")
      .map(([key, entry]): VariableEntry<unknown> => [`@${key}`, entry]);
  }

  encodingOf(value: unknown): string | null | undefined {
    if (typeof value === "string" || value instanceof RegExp) {
      return UTF8_ENCODING;
    }
    if (value instanceof ByteString) {
      return value.encoding;
    }
    return undefined;
  }

  resolveType(path: string): HostType | undefined {
    return this.catalog.resolve(path);
  }

  private baseTypeOf(value: unknown): HostType {
    const shape = this.classify(value).kind;
    switch (shape) {
      case NativeShape.Array:
      case NativeShape.Hash:
      case NativeShape.String:
      case NativeShape.Struct:
      case NativeShape.Object:
      case "unrecognized":
        if (typeof value === "object" && value !== null && !isPlainRecord(value)) {
          return this.catalog.typeForPrototype(Object.getPrototypeOf(value));
        }
        return shape === "unrecognized"
          ? BUILTIN_TYPES[NativeShape.Object]
          : BUILTIN_TYPES[shape];
      default:
        return BUILTIN_TYPES[shape];
    }
  }

  /** Own enumerable properties that are neither elements nor ByteString fields. */
  private ownProperties(value: unknown): Array<[string, unknown]> {
    if (typeof value !== "object" || value === null || isPlainRecord(value)) {
      return [];
    }
    return ownEnumerableEntries(value).filter(
      ([key]) =>
        !(Array.isArray(value) && ARRAY_INDEX_PATTERN.test(key)) &&
        !(value instanceof ByteString && BYTE_STRING_FIELDS.has(key)),
    );
  }

  private hasOwnMethods(value: unknown): boolean {
    return this.ownProperties(value).some(
      ([, entry]) => typeof entry === "function",
    );
  }
}
