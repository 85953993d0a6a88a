import { pack } from "msgpackr";
import { unsupportedShapeError } from "../errors";
import type { StringContent } from "../model/types";
import type { ByteSink } from "../sinks/types";
import { isInt32 } from "../varint";
import type { SerializerFormat, ValuePacker } from "./types";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Shape data as MessagePack. Scalars go through msgpackr; container headers
 * are written here since their elements are streamed one by one.
 */
export class MessagePackPacker implements ValuePacker {
  readonly format: SerializerFormat = "msgpack";

  constructor(private readonly sink: ByteSink) {}

  writeNil(): void {
    this.sink.write(pack(null));
  }

  writeBoolean(value: boolean): void {
    this.sink.write(pack(value));
  }

  writeFixnum(value: number | bigint): void {
    const numeric = typeof value === "bigint" ? Number(value) : value;
    // msgpackr writes integers wider than 32 bits as float64 unless given a bigint
    this.sink.write(pack(isInt32(numeric) ? numeric : BigInt(value)));
  }

  writeBignum(value: bigint): void {
    if (value < INT64_MIN || value > INT64_MAX) {
      throw unsupportedShapeError("bignum", "Bignum");
    }
    this.sink.write(pack(value));
  }

  writeFloat(value: number): void {
    this.sink.write(pack(value));
  }

  writeString(content: StringContent): void {
    this.sink.write(pack(content));
  }

  writeArrayHeader(length: number): void {
    this.writeHeader(length, 0x90, 0xdc, 0xdd);
  }

  writeHashHeader(size: number): void {
    this.writeHeader(size, 0x80, 0xde, 0xdf);
  }

  private writeHeader(
    count: number,
    fixPrefix: number,
    prefix16: number,
    prefix32: number,
  ): void {
    if (count < 16) {
      this.sink.write(Uint8Array.of(fixPrefix | count));
      return;
    }
    if (count < 0x10000) {
      this.sink.write(Uint8Array.of(prefix16, count >> 8, count & 0xff));
      return;
    }
    const header = new Uint8Array(5);
    header[0] = prefix32;
    new DataView(header.buffer).setUint32(1, count);
    this.sink.write(header);
  }
}
