import { BINARY_ENCODING, UTF8_ENCODING } from "./types";

/**
 * A string held as raw bytes with an explicit encoding name, with identity.
 * Plain JS strings are always UTF-8 and have no identity; use a ByteString
 * when a string must be shared by reference, carry instance variables, or
 * declare another encoding. `encoding: null` means the encoding is unset.
 */
export class ByteString {
  constructor(
    public readonly bytes: Uint8Array,
    public readonly encoding: string | null = BINARY_ENCODING,
  ) {}

  static fromText(text: string, encoding: string = UTF8_ENCODING): ByteString {
    return new ByteString(new TextEncoder().encode(text), encoding);
  }

  get byteLength(): number {
    return this.bytes.byteLength;
  }
}

/** Own fields of ByteString that are not instance variables. */
export const BYTE_STRING_FIELDS: ReadonlySet<string> = new Set([
  "bytes",
  "encoding",
]);
