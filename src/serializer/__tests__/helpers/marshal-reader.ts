import { decodeVarInt } from "../../varint";

const textDecoder = new TextDecoder();

/** Variables and markers read around one value. */
export interface ReadAnnotations {
  userClass?: string;
  extensions: string[];
  variables: Map<string, unknown>;
}

/**
 * Minimal reader for the marshal stream layout. Strings come back as JS
 * strings, arrays as arrays and hashes as Maps; links resolve to the value
 * registered under the same index.
 */
export class MarshalReader {
  private offset = 0;
  private readonly objects: unknown[] = [];
  private readonly symbols: string[] = [];
  /** Annotations keyed by object index. */
  readonly annotations = new Map<number, ReadAnnotations>();

  constructor(private readonly bytes: Uint8Array) {}

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  read(): unknown {
    return this.readValue({ extensions: [], variables: new Map() });
  }

  private readValue(pending: ReadAnnotations): unknown {
    const tag = this.readByte();
    switch (String.fromCharCode(tag)) {
      case "0":
        return null;
      case "T":
        return true;
      case "F":
        return false;
      case "i":
        return this.readInt();
      case "l":
        return this.readBignum();
      case "f":
        return this.readFloat();
      case '"':
        return this.register(textDecoder.decode(this.readBytes()), pending);
      case "[":
        return this.readArray(pending);
      case "{":
        return this.readHash(pending);
      case ":":
        return this.readSymbol();
      case ";":
        return this.symbols[this.readInt()];
      case "@":
        return this.objects[this.readInt()];
      case "I":
        return this.readWithVariables(pending);
      case "C":
        pending.userClass = this.readSymbolValue();
        return this.readValue(pending);
      case "e":
        pending.extensions.push(this.readSymbolValue());
        return this.readValue(pending);
      default:
        throw new Error(`Unexpected tag 0x${tag.toString(16)} at ${this.offset - 1}`);
    }
  }

  // `pending` is already stored for the value's index, so it picks these up
  private readWithVariables(pending: ReadAnnotations): unknown {
    const value = this.readValue(pending);
    const count = this.readInt();
    for (let i = 0; i < count; i++) {
      const name = this.readSymbolValue();
      pending.variables.set(name, this.read());
    }
    return value;
  }

  private readArray(pending: ReadAnnotations): unknown[] {
    const items: unknown[] = [];
    this.register(items, pending);
    const count = this.readInt();
    for (let i = 0; i < count; i++) {
      items.push(this.read());
    }
    return items;
  }

  private readHash(pending: ReadAnnotations): Map<unknown, unknown> {
    const entries = new Map<unknown, unknown>();
    this.register(entries, pending);
    const count = this.readInt();
    for (let i = 0; i < count; i++) {
      const key = this.read();
      entries.set(key, this.read());
    }
    return entries;
  }

  private register<T>(value: T, annotations: ReadAnnotations): T {
    this.annotations.set(this.objects.length, annotations);
    this.objects.push(value);
    return value;
  }

  private readSymbolValue(): string {
    const tag = this.readByte();
    if (tag === 0x3a) {
      return this.readSymbol();
    }
    if (tag === 0x3b) {
      return this.symbols[this.readInt()];
    }
    throw new Error(`Expected a symbol at ${this.offset - 1}`);
  }

  private readSymbol(): string {
    const name = textDecoder.decode(this.readBytes());
    this.symbols.push(name);
    return name;
  }

  private readBignum(): bigint {
    const sign = this.readByte();
    const words = this.readInt();
    let value = 0n;
    for (let i = words * 2 - 1; i >= 0; i--) {
      value = (value << 8n) | BigInt(this.bytes[this.offset + i]);
    }
    this.offset += words * 2;
    return sign === 0x2d ? -value : value;
  }

  private readFloat(): number {
    const text = textDecoder.decode(this.readBytes());
    if (text === "nan") return NaN;
    if (text === "inf") return Infinity;
    if (text === "-inf") return -Infinity;
    return Number(text);
  }

  private readInt(): number {
    const { value, length } = decodeVarInt(this.bytes, this.offset);
    this.offset += length;
    return value;
  }

  private readBytes(): Uint8Array {
    const length = this.readInt();
    const slice = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  private readByte(): number {
    if (this.offset >= this.bytes.length) {
      throw new Error("Unexpected end of stream");
    }
    const byte = this.bytes[this.offset];
    this.offset += 1;
    return byte;
  }
}

export const readMarshal = (bytes: Uint8Array): unknown =>
  new MarshalReader(bytes).read();

export const toHex = (bytes: Uint8Array): string =>
  Array.from(bytes, (byte) => byte.toString(16).padStart(2, "0")).join(" ");
