/**
 * Emission indices for objects and symbols, plus link emission.
 * Both namespaces start at 0 and only grow for the lifetime of one writer.
 */

import { unregisteredLinkError } from "./errors";
import { NativeShape, type Shape, type ValueModel } from "./model/types";
import type { ByteSink } from "./sinks/types";
import { encodeVarInt } from "./varint";

export const TYPE_LINK = 0x40; // '@'
export const TYPE_SYMLINK = 0x3b; // ';'

/** Integers in this inclusive range are never given an emission index. */
export const MIN_SMALL = -(2 ** 30);
export const MAX_SMALL = 2 ** 30 - 1;

const isSmallInteger = (value: number | bigint): boolean =>
  value >= MIN_SMALL && value <= MAX_SMALL;

export class IdentityCache<TValue = unknown> {
  private readonly objectIds = new WeakMap<object, number>();
  private readonly symbolIds = new Map<string, number>();
  private objectCounter = 0;

  constructor(private readonly model: ValueModel<TValue>) {}

  get objectCount(): number {
    return this.objectCounter;
  }

  get symbolCount(): number {
    return this.symbolIds.size;
  }

  shouldRegister(
    value: TValue,
    shape: Shape<TValue> = this.model.classify(value),
  ): boolean {
    switch (shape.kind) {
      case NativeShape.Nil:
      case NativeShape.True:
      case NativeShape.False:
        return false;
      case NativeShape.Fixnum:
        return !isSmallInteger(shape.value);
      default:
        return true;
    }
  }

  isRegistered(value: TValue): boolean {
    const identity = this.model.identityOf(value);
    return identity !== undefined && this.objectIds.has(identity);
  }

  indexOf(value: TValue): number | undefined {
    const identity = this.model.identityOf(value);
    return identity === undefined ? undefined : this.objectIds.get(identity);
  }

  /**
   * Assign the next object index. A value without identity still consumes
   * an index so readers stay aligned, but it can never be linked.
   */
  register(value: TValue): number {
    const identity = this.model.identityOf(value);
    const existing =
      identity === undefined ? undefined : this.objectIds.get(identity);
    if (existing !== undefined) {
      return existing;
    }

    const index = this.reserve();
    if (identity !== undefined) {
      this.objectIds.set(identity, index);
    }
    return index;
  }

  /** Consume an object index for a value that can never be linked. */
  reserve(): number {
    const index = this.objectCounter;
    this.objectCounter += 1;
    return index;
  }

  isSymbolRegistered(name: string): boolean {
    return this.symbolIds.has(name);
  }

  registerSymbol(name: string): number {
    const existing = this.symbolIds.get(name);
    if (existing !== undefined) {
      return existing;
    }
    const index = this.symbolIds.size;
    this.symbolIds.set(name, index);
    return index;
  }

  writeLink(sink: ByteSink, value: TValue): void {
    const index = this.indexOf(value);
    if (index === undefined) {
      throw unregisteredLinkError("a value");
    }
    sink.write(Uint8Array.of(TYPE_LINK));
    sink.write(encodeVarInt(index));
  }

  writeSymbolLink(sink: ByteSink, name: string): void {
    const index = this.symbolIds.get(name);
    if (index === undefined) {
      throw unregisteredLinkError(`symbol "${name}"`);
    }
    sink.write(Uint8Array.of(TYPE_SYMLINK));
    sink.write(encodeVarInt(index));
  }
}
