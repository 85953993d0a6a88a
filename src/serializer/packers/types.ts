import type { StringContent } from "../model/types";

export type SerializerFormat = "marshal" | "msgpack";

/**
 * Writes the shape data of encodable values. Everything else in the stream
 * (links, symbols, metadata markers, VarInt counts) is written by the graph
 * writer itself and is the same for every format.
 */
export interface ValuePacker {
  readonly format: SerializerFormat;
  writeNil(): void;
  writeBoolean(value: boolean): void;
  writeFixnum(value: number | bigint): void;
  writeBignum(value: bigint): void;
  writeFloat(value: number): void;
  writeString(content: StringContent): void;
  writeArrayHeader(length: number): void;
  writeHashHeader(size: number): void;
}
