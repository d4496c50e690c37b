import type { Readable } from "node:stream";

/** Raised when the underlying byte stream fails; never surfaced as an empty sequence. */
export class LineReadError extends Error {
  public readonly stream: string;

  constructor(stream: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read from ${stream}: ${reason}`, { cause });
    this.name = "LineReadError";
    this.stream = stream;
  }
}

/**
 * Lazily yields the complete lines of a byte stream, without their `\n` or
 * `\r\n` terminator. Only the current partial line is retained between chunks.
 * A trailing unterminated fragment marks end-of-stream and is not emitted.
 *
 * The generator is pulled one `next()` at a time, which lets the supervisor
 * keep exactly one pending read per stream while watching several of them.
 */
export async function* readLines(source: Readable, streamName: string): AsyncGenerator<string, void, undefined> {
  // Decoding inside the stream keeps multi-byte characters split across
  // chunks intact.
  source.setEncoding("utf8");
  let pending = "";
  const iterator = source[Symbol.asyncIterator]();

  try {
    while (true) {
      let chunk: IteratorResult<unknown>;
      try {
        chunk = await iterator.next();
      } catch (error) {
        throw new LineReadError(streamName, error);
      }
      if (chunk.done) {
        return;
      }

      pending += String(chunk.value);
      let newlineIndex = pending.indexOf("\n");
      while (newlineIndex !== -1) {
        const line = pending.slice(0, newlineIndex);
        pending = pending.slice(newlineIndex + 1);
        yield line.endsWith("\r") ? line.slice(0, -1) : line;
        newlineIndex = pending.indexOf("\n");
      }
    }
  } finally {
    // Releases the stream when the consumer stops early.
    await iterator.return?.();
  }
}
