// src/core/source/buffer.ts
// Append-only program storage. Logical length is tracked apart from the allocated capacity.

export const DEFAULT_SOURCE_CAPACITY = 1024;

export type SourceText = string | Uint8Array;

export function toBytes(text: SourceText): Uint8Array {
  return typeof text === "string" ? Buffer.from(text, "utf8") : text;
}

export class SourceBuffer {
  private bytes: Uint8Array;
  private len = 0;

  constructor(initialCapacity = DEFAULT_SOURCE_CAPACITY) {
    this.bytes = new Uint8Array(Math.max(1, Math.floor(initialCapacity)));
  }

  static from(text: SourceText): SourceBuffer {
    const bytes = toBytes(text);
    const buf = new SourceBuffer(bytes.length);
    buf.append(bytes);
    return buf;
  }

  get length(): number {
    return this.len;
  }

  get capacity(): number {
    return this.bytes.length;
  }

  byteAt(offset: number): number {
    if (offset < 0 || offset >= this.len) {
      throw new RangeError(`offset ${offset} outside source of length ${this.len}`);
    }
    return this.bytes[offset];
  }

  /**
   * Append text to the end of the buffer, doubling capacity until it fits.
   * Returns the length before the append.
   */
  append(text: SourceText): number {
    const chunk = toBytes(text);
    const before = this.len;
    const needed = before + chunk.length;

    if (needed > this.bytes.length) {
      let capacity = this.bytes.length;
      while (capacity < needed) capacity *= 2;
      const grown = new Uint8Array(capacity);
      grown.set(this.bytes.subarray(0, before));
      this.bytes = grown;
    }

    this.bytes.set(chunk, before);
    this.len = needed;
    return before;
  }

  /** Drop everything past `length`. Used to roll back a rejected REPL line. */
  truncate(length: number): void {
    if (length < 0 || length > this.len) {
      throw new RangeError(`cannot truncate source of length ${this.len} to ${length}`);
    }
    this.bytes.fill(0, length, this.len);
    this.len = length;
  }

  clear(): void {
    this.truncate(0);
  }

  indexOf(byte: number, from = 0): number {
    return this.view().indexOf(byte, from);
  }

  view(): Uint8Array {
    return this.bytes.subarray(0, this.len);
  }

  text(): string {
    return Buffer.from(this.view()).toString("utf8");
  }
}
