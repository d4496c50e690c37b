import { Buffer } from "node:buffer";

/** Marker appended once when the stderr capture reaches its cap. */
export const STDERR_TRUNCATION_MARKER = "\n... (stderr truncated)";

/**
 * Cuts a string to at most {@link maxBytes} UTF-8 bytes without splitting a
 * multi-byte character.
 */
export function truncateUtf8(text: string, maxBytes: number): string {
  const encoded = Buffer.from(text, "utf8");
  if (encoded.length <= maxBytes) {
    return text;
  }
  let end = Math.max(0, maxBytes);
  // Back off continuation bytes (10xxxxxx) to the start of the cut character.
  while (end > 0 && (encoded[end] & 0xc0) === 0x80) {
    end -= 1;
  }
  return encoded.subarray(0, end).toString("utf8");
}

/**
 * Newline-joined text capped at a byte budget. Once the cap is hit a single
 * truncation marker is appended and every later line is discarded, so the
 * caller keeps draining the pipe without growing memory.
 */
export class BoundedTextBuffer {
  private text = "";
  private bytes = 0;
  private truncated = false;

  constructor(private readonly maxBytes: number) {}

  append(line: string): void {
    if (this.truncated) {
      return;
    }
    const addition = this.text.length > 0 ? `\n${line}` : line;
    const additionBytes = Buffer.byteLength(addition, "utf8");
    if (this.bytes + additionBytes <= this.maxBytes) {
      this.text += addition;
      this.bytes += additionBytes;
      return;
    }
    this.text += truncateUtf8(addition, this.maxBytes - this.bytes) + STDERR_TRUNCATION_MARKER;
    this.truncated = true;
  }

  get isTruncated(): boolean {
    return this.truncated;
  }

  toString(): string {
    return this.text;
  }
}

/** Append-only list keeping the first {@link capacity} entries. */
export class BoundedList<T> {
  private readonly items: T[] = [];

  constructor(private readonly capacity: number) {}

  /** Returns `false` when the entry was dropped because the list is full. */
  push(item: T): boolean {
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  get length(): number {
    return this.items.length;
  }

  toArray(): T[] {
    return [...this.items];
  }
}
