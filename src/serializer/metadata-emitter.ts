/**
 * Metadata written around shape data: the ivar-table prefix, extension and
 * user-class markers, and the trailing variable table with its encoding slot.
 */

import {
  anonymousError,
  singletonError,
  unresolvableReferenceError,
} from "./errors";
import {
  BINARY_ENCODING,
  NativeShape,
  US_ASCII_ENCODING,
  UTF8_ENCODING,
  realClassOf,
  type HostType,
  type ShapeKind,
  type ValueModel,
  type VariableEntry,
} from "./model/types";

export const TYPE_IVAR = 0x49; // 'I'
export const TYPE_UCLASS = 0x43; // 'C'
export const TYPE_EXTENDED = 0x65; // 'e'

export const ENCODING_SHORT_SYMBOL = "E";
export const ENCODING_LONG_SYMBOL = "encoding";

const ENCODING_ALIASES: ReadonlyMap<string, string> = new Map([
  ["BINARY", BINARY_ENCODING],
  ["ASCII", US_ASCII_ENCODING],
]);

/** Upper-cased encoding name with aliases folded into their canonical name. */
export const canonicalEncoding = (name: string): string => {
  const upper = name.toUpperCase();
  return ENCODING_ALIASES.get(upper) ?? upper;
};

const EXTENDED_SHAPES: ReadonlySet<ShapeKind> = new Set([
  NativeShape.String,
  NativeShape.Regexp,
  NativeShape.Array,
  NativeShape.Hash,
]);

/** Stream operations the emitter needs from the graph writer. */
export interface MetadataHost<TValue> {
  writeByte(byte: number): void;
  writeVarInt(value: number): void;
  writeSymbol(name: string): void;
  writeObject(value: TValue): void;
  writeBooleanData(value: boolean): void;
  /** `"` + VarInt(length) + bytes; consumes an object index. */
  writeEncodingName(name: string): void;
}

export interface MetadataEmitterOptions {
  encodingMetadata: boolean;
}

export class MetadataEmitter<TValue> {
  constructor(
    private readonly model: ValueModel<TValue>,
    private readonly host: MetadataHost<TValue>,
    private readonly options: MetadataEmitterOptions,
  ) {}

  /**
   * Writes the prefix markers for `value`. Returns the instance variables to
   * emit after the shape data, or null when no variable table follows.
   */
  prepare(
    value: TValue,
    shape: ShapeKind,
  ): ReadonlyArray<VariableEntry<TValue>> | null {
    if (
      shape === NativeShape.Object ||
      shape === NativeShape.BasicObject ||
      shape === "unrecognized"
    ) {
      return null;
    }

    const ivars = this.model.variablesOf(value);
    const hasIvars =
      ivars.length > 0 &&
      shape !== NativeShape.Class &&
      shape !== NativeShape.Module;
    const variables =
      this.needsEncoding(value, shape) || hasIvars ? ivars : null;

    // Every name is resolved before the first marker byte reaches the sink.
    let type = this.model.typeOf(value);
    let extensions: readonly string[] = [];
    if (EXTENDED_SHAPES.has(shape)) {
      ({ type, extensions } = this.resolveExtendedChain(type));
    }
    const userClass =
      type.builtinShape !== shape && shape !== NativeShape.Struct
        ? this.qualifiedName(type)
        : null;

    if (variables !== null) {
      this.host.writeByte(TYPE_IVAR);
    }
    for (const name of extensions) {
      this.host.writeByte(TYPE_EXTENDED);
      this.host.writeSymbol(name);
    }
    if (userClass !== null) {
      this.host.writeByte(TYPE_UCLASS);
      this.host.writeSymbol(userClass);
    }

    return variables;
  }

  /**
   * Skips a stateless singleton and collects the names of the mixed-in
   * modules, innermost first. `type` is the concrete class below them.
   */
  resolveExtendedChain(type: HostType): {
    type: HostType;
    extensions: string[];
  } {
    const extensions: string[] = [];
    let current = type;
    if (current.singleton) {
      if (current.singleton.hasState) {
        throw singletonError(current.name);
      }
      if (!current.superclass) {
        return { type: current, extensions };
      }
      current = current.superclass;
    }

    while (current.includedModule) {
      extensions.push(this.qualifiedName(current.includedModule));
      if (!current.superclass) {
        break;
      }
      current = current.superclass;
    }
    return { type: current, extensions };
  }

  qualifiedName(type: HostType): string {
    if (type.name.startsWith("#")) {
      throw anonymousError(type.kind, type.name);
    }
    const expected = type.kind === "module" ? type : realClassOf(type);
    if (this.model.resolveType(type.name) !== expected) {
      throw unresolvableReferenceError(type.name);
    }
    return type.name;
  }

  emitVariables(
    variables: ReadonlyArray<VariableEntry<TValue>>,
    value: TValue,
    shape: ShapeKind,
  ): void {
    if (this.needsEncoding(value, shape)) {
      this.host.writeVarInt(variables.length + 1);
      this.writeEncoding(this.model.encodingOf(value) ?? null);
    } else {
      this.host.writeVarInt(variables.length);
    }

    for (const [name, entry] of variables) {
      this.host.writeSymbol(name);
      this.host.writeObject(entry);
    }
  }

  private needsEncoding(value: TValue, shape: ShapeKind): boolean {
    if (
      !this.options.encodingMetadata ||
      (shape !== NativeShape.String && shape !== NativeShape.Regexp)
    ) {
      return false;
    }
    const encoding = this.model.encodingOf(value);
    return !encoding || canonicalEncoding(encoding) !== BINARY_ENCODING;
  }

  private writeEncoding(name: string | null): void {
    if (name === null || canonicalEncoding(name) === US_ASCII_ENCODING) {
      this.host.writeSymbol(ENCODING_SHORT_SYMBOL);
      this.host.writeBooleanData(false);
      return;
    }
    if (canonicalEncoding(name) === UTF8_ENCODING) {
      this.host.writeSymbol(ENCODING_SHORT_SYMBOL);
      this.host.writeBooleanData(true);
      return;
    }
    this.host.writeSymbol(ENCODING_LONG_SYMBOL);
    this.host.writeEncodingName(name);
  }
}
