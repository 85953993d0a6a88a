/**
 * Destination of the encoded stream. Writes are synchronous; the writer calls
 * `flush()` then `close()` once, when a top-level dump completes.
 */
export interface ByteSink {
  write(chunk: Uint8Array): void;
  flush(): void;
  close(): void;
}
