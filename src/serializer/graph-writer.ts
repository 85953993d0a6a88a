/**
 * Depth-first writer for one object graph.
 *
 * Repeated objects become `@` links and repeated symbols become `;` links.
 * Shape data goes through the ValuePacker of the chosen format; every other
 * construct is written here.
 */

import type { Logger } from "../models/Logger";
import {
  depthExceededError,
  streamFinalizedError,
  unrecognizedError,
  unsupportedShapeError,
} from "./errors";
import { IdentityCache } from "./identity-cache";
import { MetadataEmitter, type MetadataHost } from "./metadata-emitter";
import {
  NativeShape,
  type Shape,
  type ValueModel,
} from "./model/types";
import { MarshalPacker } from "./packers/MarshalPacker";
import { MessagePackPacker } from "./packers/MessagePackPacker";
import type { SerializerFormat, ValuePacker } from "./packers/types";
import type { ByteSink } from "./sinks/types";
import { encodeVarInt } from "./varint";

export const TYPE_SYMBOL = 0x3a; // ':'
export const TYPE_STRING = 0x22; // '"'

const textEncoder = new TextEncoder();

export interface GraphWriterOptions {
  format: SerializerFormat;
  encodingMetadata: boolean;
  maxDepth: number;
  logger?: Logger;
}

export interface GraphWriterStats {
  objects: number;
  symbols: number;
}

export const createPacker = (
  format: SerializerFormat,
  sink: ByteSink,
): ValuePacker =>
  format === "msgpack" ? new MessagePackPacker(sink) : new MarshalPacker(sink);

export class GraphWriter<TValue = unknown> implements MetadataHost<TValue> {
  private readonly cache: IdentityCache<TValue>;
  private readonly packer: ValuePacker;
  private readonly metadata: MetadataEmitter<TValue>;
  private depth = 0;
  private finalized = false;

  constructor(
    private readonly sink: ByteSink,
    private readonly model: ValueModel<TValue>,
    private readonly options: GraphWriterOptions,
  ) {
    this.cache = new IdentityCache(model);
    this.packer = createPacker(options.format, sink);
    this.metadata = new MetadataEmitter(model, this, {
      encodingMetadata: options.encodingMetadata,
    });
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  get stats(): GraphWriterStats {
    return {
      objects: this.cache.objectCount,
      symbols: this.cache.symbolCount,
    };
  }

  /**
   * Writes `value` and everything reachable from it. When the outermost call
   * returns, the sink is flushed and closed.
   */
  writeObject(value: TValue): void {
    if (this.finalized) {
      throw streamFinalizedError();
    }

    this.depth += 1;
    try {
      if (this.depth > this.options.maxDepth) {
        throw depthExceededError(this.options.maxDepth);
      }
      this.writeOrLink(value);
    } finally {
      this.depth -= 1;
    }

    if (this.depth === 0) {
      this.finalize();
    }
  }

  /** Pre-seeds the object cache so later occurrences of `value` are links. */
  registerObject(value: TValue, shape?: Shape<TValue>): void {
    if (this.cache.shouldRegister(value, shape)) {
      this.cache.register(value);
    }
  }

  registerSymbol(name: string): void {
    this.cache.registerSymbol(name);
  }

  writeSymbol(name: string): void {
    if (this.cache.isSymbolRegistered(name)) {
      this.cache.writeSymbolLink(this.sink, name);
      return;
    }
    this.cache.registerSymbol(name);
    this.writeByte(TYPE_SYMBOL);
    this.writeRawBytes(textEncoder.encode(name));
  }

  writeByte(byte: number): void {
    this.sink.write(Uint8Array.of(byte));
  }

  writeVarInt(value: number): void {
    this.sink.write(encodeVarInt(value));
  }

  writeBooleanData(value: boolean): void {
    this.packer.writeBoolean(value);
  }

  writeEncodingName(name: string): void {
    this.cache.reserve();
    this.writeByte(TYPE_STRING);
    this.writeRawBytes(textEncoder.encode(name));
  }

  private writeOrLink(value: TValue): void {
    if (this.cache.isRegistered(value)) {
      this.cache.writeLink(this.sink, value);
      return;
    }
    this.writeDirectly(value);
  }

  private writeDirectly(value: TValue): void {
    const shape = this.model.classify(value);
    const variables = this.metadata.prepare(value, shape.kind);
    this.writeShapeData(value, shape);
    if (variables) {
      this.metadata.emitVariables(variables, value, shape.kind);
    }
  }

  private writeShapeData(value: TValue, shape: Shape<TValue>): void {
    switch (shape.kind) {
      case NativeShape.Nil:
        this.packer.writeNil();
        return;
      case NativeShape.True:
        this.packer.writeBoolean(true);
        return;
      case NativeShape.False:
        this.packer.writeBoolean(false);
        return;
      case NativeShape.Fixnum:
        this.packer.writeFixnum(shape.value);
        return;
      case NativeShape.Bignum:
        this.packer.writeBignum(shape.value);
        return;
      case NativeShape.Float:
        this.packer.writeFloat(shape.value);
        return;
      case NativeShape.String:
        this.registerObject(value, shape);
        this.packer.writeString(shape.content);
        return;
      case NativeShape.Array:
        this.registerObject(value, shape);
        this.packer.writeArrayHeader(shape.items.length);
        for (const item of shape.items) {
          this.writeObject(item);
        }
        return;
      case NativeShape.Hash:
        this.registerObject(value, shape);
        this.packer.writeHashHeader(shape.entries.length);
        for (const [key, entry] of shape.entries) {
          this.writeObject(key);
          this.writeObject(entry);
        }
        return;
      case "unrecognized":
        throw unrecognizedError(this.model.typeOf(value).name);
      default:
        throw unsupportedShapeError(shape.kind, this.model.typeOf(value).name);
    }
  }

  private writeRawBytes(bytes: Uint8Array): void {
    this.writeVarInt(bytes.length);
    this.sink.write(bytes);
  }

  private finalize(): void {
    this.finalized = true;
    this.sink.flush();
    this.sink.close();
    this.options.logger?.trace("Stream finalized", {
      data: { ...this.stats },
    });
  }
}
