/**
 * Classification of JS values into native shapes.
 *
 * The shape is intrinsic: a `class Stack extends Array` instance is an array,
 * a `Map` subclass instance is a hash. User subclassing only shows up in the
 * value's current type (see JsValueModel.typeOf).
 */

import { ByteString } from "./model/ByteString";
import type { TypeCatalog } from "./model/type-catalog";
import { NativeShape, type Shape } from "./model/types";

/** Integers in this range classify as fixnums, wider ones as bignums. */
export const FIXNUM_MIN = -(2n ** 62n);
export const FIXNUM_MAX = 2n ** 62n - 1n;

// Built-ins backed by internal slots the writer cannot see into.
const OPAQUE_CONSTRUCTORS: ReadonlyArray<abstract new (...args: never[]) => unknown> = [
  Date,
  Set,
  WeakMap,
  WeakSet,
  Promise,
  ArrayBuffer,
  DataView,
  Error,
  String,
  Number,
  Boolean,
];

const isOpaque = (value: object): boolean =>
  ArrayBuffer.isView(value) ||
  OPAQUE_CONSTRUCTORS.some((ctor) => value instanceof ctor);

export const isPlainRecord = (value: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

const isModuleNamespace = (value: object): boolean =>
  Object.prototype.toString.call(value) === "[object Module]";

export function classifyJsValue(
  value: unknown,
  catalog: TypeCatalog,
): Shape<unknown> {
  if (value === null || value === undefined) {
    return { kind: NativeShape.Nil };
  }

  switch (typeof value) {
    case "boolean":
      return value ? { kind: NativeShape.True } : { kind: NativeShape.False };
    case "number":
      return Number.isSafeInteger(value) && !Object.is(value, -0)
        ? { kind: NativeShape.Fixnum, value }
        : { kind: NativeShape.Float, value };
    case "bigint":
      return value >= FIXNUM_MIN && value <= FIXNUM_MAX
        ? { kind: NativeShape.Fixnum, value }
        : { kind: NativeShape.Bignum, value };
    case "string":
      return { kind: NativeShape.String, content: value };
    case "symbol":
      return { kind: NativeShape.Symbol };
    case "function":
      return { kind: NativeShape.Class };
    case "object":
      return classifyObject(value, catalog);
    default:
      return { kind: "unrecognized" };
  }
}

function classifyObject(value: object, catalog: TypeCatalog): Shape<unknown> {
  if (value instanceof ByteString) {
    return { kind: NativeShape.String, content: value.bytes };
  }
  if (Array.isArray(value)) {
    return { kind: NativeShape.Array, items: value };
  }
  if (value instanceof Map) {
    return { kind: NativeShape.Hash, entries: Array.from(value.entries()) };
  }
  if (value instanceof RegExp) {
    return { kind: NativeShape.Regexp };
  }
  if (isModuleNamespace(value)) {
    return { kind: NativeShape.Module };
  }
  if (isOpaque(value)) {
    return { kind: "unrecognized" };
  }
  if (isPlainRecord(value)) {
    return { kind: NativeShape.Hash, entries: Object.entries(value) };
  }
  if (catalog.isStructPrototype(Object.getPrototypeOf(value))) {
    return { kind: NativeShape.Struct };
  }
  return { kind: NativeShape.Object };
}
