/**
 * The host object model as seen by the graph writer.
 *
 * The writer never inspects values itself. It asks a {@link ValueModel} for the
 * intrinsic shape of a value, its current type, identity, instance variables
 * and text encoding.
 */

/**
 * Intrinsic shape families. A value keeps its shape even when its current
 * type is a user subclass of the built-in class.
 */
export enum NativeShape {
  Nil = "nil",
  True = "true",
  False = "false",
  Fixnum = "fixnum",
  Bignum = "bignum",
  Float = "float",
  String = "string",
  Array = "array",
  Hash = "hash",
  Class = "class",
  Module = "module",
  Object = "object",
  BasicObject = "basicObject",
  Struct = "struct",
  Regexp = "regexp",
  Symbol = "symbol",
}

export type UnsupportedNativeShape =
  | NativeShape.Class
  | NativeShape.Module
  | NativeShape.Object
  | NativeShape.BasicObject
  | NativeShape.Struct
  | NativeShape.Regexp
  | NativeShape.Symbol;

/** Raw content of a string value: text, or bytes in a declared encoding. */
export type StringContent = string | Uint8Array;

/**
 * Tagged variant produced by classification. Only nil, booleans, integers,
 * floats, strings, arrays and hashes carry a payload the writer can encode.
 */
export type Shape<TValue> =
  | { kind: NativeShape.Nil }
  | { kind: NativeShape.True }
  | { kind: NativeShape.False }
  | { kind: NativeShape.Fixnum; value: number | bigint }
  | { kind: NativeShape.Bignum; value: bigint }
  | { kind: NativeShape.Float; value: number }
  | { kind: NativeShape.String; content: StringContent }
  | { kind: NativeShape.Array; items: readonly TValue[] }
  | { kind: NativeShape.Hash; entries: ReadonlyArray<readonly [TValue, TValue]> }
  | { kind: UnsupportedNativeShape }
  | { kind: "unrecognized" };

export type ShapeKind = Shape<unknown>["kind"];

/**
 * Class or module metadata. Chains are walked through `superclass`.
 */
export interface HostType {
  /** Fully qualified name. Anonymous types have names starting with `#`. */
  readonly name: string;
  readonly kind: "class" | "module";
  readonly superclass: HostType | undefined;
  /** Present on a per-instance (singleton) type. */
  readonly singleton?: { readonly hasState: boolean };
  /** Present when this chain entry stands for a module mixed into the type below it. */
  readonly includedModule?: HostType;
  /** Set only on the built-in class of a shape family (Array, Hash, String...). */
  readonly builtinShape?: NativeShape;
}

export type VariableEntry<TValue> = readonly [name: string, value: TValue];

export interface ValueModel<TValue = unknown> {
  classify(value: TValue): Shape<TValue>;
  /** Current type of the value, possibly a user subclass or a singleton. */
  typeOf(value: TValue): HostType;
  /** Identity handle, or undefined for values compared by value. */
  identityOf(value: TValue): object | undefined;
  variablesOf(value: TValue): ReadonlyArray<VariableEntry<TValue>>;
  /**
   * Encoding name of a string or regexp value; `null` when the value has no
   * encoding set, `undefined` when the value is not encoding-capable.
   */
  encodingOf(value: TValue): string | null | undefined;
  /** Reverse lookup used to check that a qualified name refers back to a type. */
  resolveType(path: string): HostType | undefined;
}

export const BINARY_ENCODING = "ASCII-8BIT";
export const US_ASCII_ENCODING = "US-ASCII";
export const UTF8_ENCODING = "UTF-8";

/** Walks past singleton and included-module entries to the concrete class. */
export const realClassOf = (type: HostType): HostType => {
  let current: HostType = type;
  while (
    (current.singleton || current.includedModule) &&
    current.superclass
  ) {
    current = current.superclass;
  }
  return current;
};
