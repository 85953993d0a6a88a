import * as fs from "fs";
import { streamFinalizedError } from "../errors";
import { BufferSink } from "./BufferSink";
import type { ByteSink } from "./types";

/**
 * Sink backed by a file descriptor. Bytes are buffered in memory and written
 * with blocking calls on flush; close releases the descriptor.
 */
export class FileSink implements ByteSink {
  private pending = new BufferSink();
  private fd: number | null;

  constructor(public readonly path: string) {
    this.fd = fs.openSync(path, "w");
  }

  write(chunk: Uint8Array): void {
    this.assertOpen();
    this.pending.write(chunk);
  }

  flush(): void {
    const fd = this.assertOpen();
    const bytes = this.pending.toUint8Array();
    let offset = 0;
    while (offset < bytes.length) {
      offset += fs.writeSync(fd, bytes, offset, bytes.length - offset);
    }
    fs.fsyncSync(fd);
    this.pending = new BufferSink();
  }

  close(): void {
    if (this.fd === null) {
      return;
    }
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }

  private assertOpen(): number {
    if (this.fd === null) {
      throw streamFinalizedError();
    }
    return this.fd;
  }
}
