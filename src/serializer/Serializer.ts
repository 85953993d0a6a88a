/**
 * Object-graph serializer with identity-aware backreferences.
 */

import type { Logger } from "../models/Logger";
import { typeCatalogError } from "./errors";
import { GraphWriter } from "./graph-writer";
import { JsValueModel } from "./model/JsValueModel";
import type { AnyConstructor } from "./model/type-catalog";
import type { ValueModel } from "./model/types";
import {
  normalizeSerializerOptions,
  type SerializerOptions,
  type WriterSettings,
} from "./options";
import type { SerializerFormat } from "./packers/types";
import { BufferSink } from "./sinks/BufferSink";
import { FileSink } from "./sinks/FileSink";
import type { ByteSink } from "./sinks/types";

export const LOG_SOURCE = "graphdump.serializer";

export class Serializer {
  private readonly settings: WriterSettings;
  private readonly logger: Logger;
  private readonly jsModel: JsValueModel | undefined;
  private readonly model: ValueModel<unknown>;

  constructor(options: SerializerOptions = {}) {
    const normalized = normalizeSerializerOptions(options);
    this.settings = {
      format: normalized.format,
      encodingMetadata: normalized.encodingMetadata,
      maxDepth: normalized.maxDepth,
    };
    this.logger = normalized.logger.with({ source: LOG_SOURCE });
    if (normalized.model) {
      this.model = normalized.model;
    } else {
      this.jsModel = new JsValueModel();
      this.model = this.jsModel;
    }
  }

  get format(): SerializerFormat {
    return this.settings.format;
  }

  /**
   * Register a class under a qualified name. Instances of registered
   * Array, Map or ByteString subclasses are dumped with a user-class marker.
   */
  public registerClass(ctor: AnyConstructor, name: string): void {
    this.requireJsModel().catalog.registerClass(ctor, name);
  }

  /** Register a mixin application; its instances are dumped as extended. */
  public registerModule(ctor: AnyConstructor, name: string): void {
    this.requireJsModel().catalog.registerModule(ctor, name);
  }

  public registerStruct(ctor: AnyConstructor, name: string): void {
    this.requireJsModel().catalog.registerStruct(ctor, name);
  }

  /**
   * Writes `root` to `sink` with a fresh identity cache. The sink is flushed
   * and closed on success; on failure it is left as is.
   */
  public serialize(root: unknown, sink: ByteSink): void {
    const writer = this.createWriter(sink);
    this.logger.debug("Dump started", {
      data: { format: this.settings.format },
    });
    try {
      writer.writeObject(root);
    } catch (error) {
      this.logger.error("Dump aborted", { error });
      throw error;
    }
    this.logger.debug("Dump finished", { data: { ...writer.stats } });
  }

  public dump(root: unknown): Uint8Array {
    const sink = new BufferSink();
    this.serialize(root, sink);
    this.logger.trace("Dump buffered", { data: { bytes: sink.length } });
    return sink.toUint8Array();
  }

  /** Dumps `root` into the file at `path`, replacing its contents. */
  public dumpToFile(root: unknown, path: string): void {
    const sink = new FileSink(path);
    try {
      this.serialize(root, sink);
    } catch (error) {
      // release the descriptor; unflushed bytes are dropped
      sink.close();
      throw error;
    }
  }

  /** A writer over `sink` whose cache callers may pre-seed. */
  public createWriter(sink: ByteSink): GraphWriter<unknown> {
    return new GraphWriter(sink, this.model, {
      ...this.settings,
      logger: this.logger,
    });
  }

  private requireJsModel(): JsValueModel {
    if (!this.jsModel) {
      throw typeCatalogError(
        "Type registration is only available with the built-in JS value model",
      );
    }
    return this.jsModel;
  }
}
