/**
 * Main export module for the Serializer
 */

import { Serializer } from "./Serializer";

export { Serializer, LOG_SOURCE } from "./Serializer";
export { GraphWriter, createPacker } from "./graph-writer";
export type { GraphWriterOptions, GraphWriterStats } from "./graph-writer";
export { MetadataEmitter } from "./metadata-emitter";
export type { MetadataHost } from "./metadata-emitter";
export { IdentityCache } from "./identity-cache";
export { classifyJsValue } from "./type-classifier";
export { encodeVarInt, decodeVarInt } from "./varint";
export type { DecodedVarInt } from "./varint";
export {
  normalizeSerializerOptions,
  DEFAULT_FORMAT,
  DEFAULT_MAX_DEPTH,
} from "./options";
export type { SerializerOptions, WriterSettings } from "./options";
export { JsValueModel } from "./model/JsValueModel";
export { ByteString } from "./model/ByteString";
export { TypeCatalog, BUILTIN_TYPES } from "./model/type-catalog";
export type { AnyConstructor, CatalogEntry } from "./model/type-catalog";
export * from "./model/types";
export { MarshalPacker } from "./packers/MarshalPacker";
export { MessagePackPacker } from "./packers/MessagePackPacker";
export type { SerializerFormat, ValuePacker } from "./packers/types";
export { BufferSink } from "./sinks/BufferSink";
export { FileSink } from "./sinks/FileSink";
export type { ByteSink } from "./sinks/types";

let defaultSerializer: Serializer | undefined;

export function getDefaultSerializer(): Serializer {
  defaultSerializer ??= new Serializer();
  return defaultSerializer;
}
