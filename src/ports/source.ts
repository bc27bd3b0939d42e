import { toBytes, type SourceText } from "../core/source/buffer";

/**
 * Input port interface.
 * Byte source consumed by the ',' instruction.
 */
export interface InputPort {
  /**
   * Read the next byte, blocking if necessary.
   * @returns The byte, or null once the source is exhausted
   */
  readByte(): number | null;
}

/**
 * Line source interface.
 * Supplies REPL input one line at a time, without its line terminator.
 */
export interface LineSource {
  /** @returns The next line, or null when the source is closed */
  readLine(): string | null;
}

export class BufferInput implements InputPort {
  private readonly bytes: Uint8Array;
  private pos = 0;

  constructor(data: SourceText = "") {
    this.bytes = toBytes(data);
  }

  readByte(): number | null {
    if (this.pos >= this.bytes.length) return null;
    return this.bytes[this.pos++];
  }

  get remaining(): number {
    return this.bytes.length - this.pos;
  }
}

export class ArrayLineSource implements LineSource {
  private next = 0;

  constructor(private readonly lines: readonly string[]) {}

  readLine(): string | null {
    if (this.next >= this.lines.length) return null;
    return this.lines[this.next++];
  }
}
