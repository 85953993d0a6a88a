import type { StringContent } from "../model/types";
import type { ByteSink } from "../sinks/types";
import { encodeVarInt, isInt32 } from "../varint";
import type { SerializerFormat, ValuePacker } from "./types";

export const TYPE_NIL = 0x30; // '0'
export const TYPE_TRUE = 0x54; // 'T'
export const TYPE_FALSE = 0x46; // 'F'
export const TYPE_FIXNUM = 0x69; // 'i'
export const TYPE_BIGNUM = 0x6c; // 'l'
export const TYPE_FLOAT = 0x66; // 'f'
export const TYPE_STRING = 0x22; // '"'
export const TYPE_ARRAY = 0x5b; // '['
export const TYPE_HASH = 0x7b; // '{'

const SIGN_PLUS = 0x2b; // '+'
const SIGN_MINUS = 0x2d; // '-'

const textEncoder = new TextEncoder();

export const toBytes = (content: StringContent): Uint8Array =>
  typeof content === "string" ? textEncoder.encode(content) : content;

/** Text form of a float: `inf`, `-inf`, `nan`, `0`, `-0` or the shortest decimal. */
export const formatFloat = (value: number): string => {
  if (Number.isNaN(value)) {
    return "nan";
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf";
  }
  if (value === 0) {
    return Object.is(value, -0) ? "-0" : "0";
  }
  return String(value).replace("e+", "e");
};

/** Little-endian magnitude bytes, padded to a whole number of 16-bit words. */
export const bignumWords = (value: bigint): Uint8Array => {
  const bytes: number[] = [];
  let magnitude = value < 0n ? -value : value;
  while (magnitude > 0n) {
    bytes.push(Number(magnitude & 0xffn));
    magnitude >>= 8n;
  }
  if (bytes.length % 2 === 1) {
    bytes.push(0);
  }
  return Uint8Array.from(bytes);
};

/**
 * Shape data in the tagged layout: one type byte, then VarInt lengths and
 * raw payload.
 */
export class MarshalPacker implements ValuePacker {
  readonly format: SerializerFormat = "marshal";

  constructor(private readonly sink: ByteSink) {}

  writeNil(): void {
    this.writeByte(TYPE_NIL);
  }

  writeBoolean(value: boolean): void {
    this.writeByte(value ? TYPE_TRUE : TYPE_FALSE);
  }

  writeFixnum(value: number | bigint): void {
    const numeric = typeof value === "bigint" ? Number(value) : value;
    if (isInt32(numeric)) {
      this.writeByte(TYPE_FIXNUM);
      this.sink.write(encodeVarInt(numeric));
      return;
    }
    this.writeBignum(BigInt(value));
  }

  writeBignum(value: bigint): void {
    const words = bignumWords(value);
    this.writeByte(TYPE_BIGNUM);
    this.writeByte(value < 0n ? SIGN_MINUS : SIGN_PLUS);
    this.sink.write(encodeVarInt(words.length / 2));
    this.sink.write(words);
  }

  writeFloat(value: number): void {
    this.writeByte(TYPE_FLOAT);
    this.writeBytes(textEncoder.encode(formatFloat(value)));
  }

  writeString(content: StringContent): void {
    this.writeByte(TYPE_STRING);
    this.writeBytes(toBytes(content));
  }

  writeArrayHeader(length: number): void {
    this.writeByte(TYPE_ARRAY);
    this.sink.write(encodeVarInt(length));
  }

  writeHashHeader(size: number): void {
    this.writeByte(TYPE_HASH);
    this.sink.write(encodeVarInt(size));
  }

  private writeByte(value: number): void {
    this.sink.write(Uint8Array.of(value));
  }

  private writeBytes(bytes: Uint8Array): void {
    this.sink.write(encodeVarInt(bytes.length));
    this.sink.write(bytes);
  }
}
