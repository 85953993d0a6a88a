import { streamFinalizedError } from "../errors";
import type { ByteSink } from "./types";

const INITIAL_CAPACITY = 256;

/**
 * In-memory sink. Chunks are copied on write, so callers may reuse their
 * buffers.
 */
export class BufferSink implements ByteSink {
  private buffer = new Uint8Array(INITIAL_CAPACITY);
  private position = 0;
  private closed = false;
  private flushCount = 0;

  get length(): number {
    return this.position;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get flushes(): number {
    return this.flushCount;
  }

  write(chunk: Uint8Array): void {
    if (this.closed) {
      throw streamFinalizedError();
    }
    this.ensureCapacity(this.position + chunk.length);
    this.buffer.set(chunk, this.position);
    this.position += chunk.length;
  }

  flush(): void {
    this.flushCount += 1;
  }

  close(): void {
    this.closed = true;
  }

  /** Copy of everything written so far. */
  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.position);
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) {
      return;
    }
    let capacity = this.buffer.length * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.position));
    this.buffer = next;
  }
}
