/**
 * Signed variable-length integer codec used for every length, count and
 * link index in the stream.
 *
 *   0            -> 00
 *   1..122       -> v + 5
 *   -123..-1     -> (v - 5) & 0xff
 *   otherwise    -> +len / -len, then 1-4 little-endian two's-complement bytes
 */

import { varIntRangeError } from "./errors";

export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;

export interface DecodedVarInt {
  value: number;
  /** Number of bytes consumed, prefix included. */
  length: number;
}

export const isInt32 = (value: number): boolean =>
  Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;

export function encodeVarInt(value: number): Uint8Array {
  if (!isInt32(value)) {
    throw varIntRangeError(`VarInt out of range: ${value}`);
  }

  if (value === 0) {
    return Uint8Array.of(0);
  }
  if (value > 0 && value < 123) {
    return Uint8Array.of(value + 5);
  }
  if (value > -124 && value < 0) {
    return Uint8Array.of((value - 5) & 0xff);
  }

  const buf = new Uint8Array(5);
  let rest = value;
  let i = 0;
  for (; i < 4; i++) {
    buf[i + 1] = rest & 0xff;
    rest = rest >> 8;
    if (rest === 0 || rest === -1) {
      break;
    }
  }
  const len = i + 1;
  buf[0] = (rest < 0 ? -len : len) & 0xff;
  return buf.slice(0, len + 1);
}

export function decodeVarInt(bytes: Uint8Array, offset = 0): DecodedVarInt {
  if (offset >= bytes.length) {
    throw varIntRangeError(`VarInt truncated at offset ${offset}`);
  }

  const c = (bytes[offset] << 24) >> 24;
  if (c === 0) {
    return { value: 0, length: 1 };
  }
  if (c > 4) {
    return { value: c - 5, length: 1 };
  }
  if (c < -4) {
    return { value: c + 5, length: 1 };
  }

  const len = Math.abs(c);
  if (offset + len >= bytes.length) {
    throw varIntRangeError(`VarInt truncated at offset ${offset}`);
  }

  let value = c > 0 ? 0 : -1;
  for (let i = 0; i < len; i++) {
    const shift = 8 * i;
    value &= ~(0xff << shift);
    value |= bytes[offset + 1 + i] << shift;
  }
  return { value, length: len + 1 };
}
