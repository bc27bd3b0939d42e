// src/ports/fd.ts
// Synchronous file-descriptor ports backing the CLI (stdin / stdout)

import * as fs from "fs";
import type { InputPort, LineSource } from "./source";
import type { ByteSink } from "./sink";

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

const MAX_RETRY_DELAY_MS = 50;

function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

/** Milliseconds to wait before retry `attempt` (0-based) of a read that hit EAGAIN. */
export function retryDelay(attempt: number): number {
  return Math.min(MAX_RETRY_DELAY_MS, 2 ** Math.min(attempt, 6));
}

/** The blocking calls FdReader makes; swapped out in tests. */
export type FdIo = {
  read(fd: number, buffer: Buffer): number;
  sleep(ms: number): void;
};

const sleepCell = new Int32Array(new SharedArrayBuffer(4));

export const nodeFdIo: FdIo = {
  read: (fd, buffer) => fs.readSync(fd, buffer, 0, buffer.length, null),
  sleep: (ms) => {
    Atomics.wait(sleepCell, 0, 0, ms);
  },
};

/**
 * Blocking reader over a file descriptor.
 *
 * Serves both the ',' instruction and REPL prompt lines from one buffer, so
 * bytes typed after a line of code are seen by the program that line runs.
 */
export class FdReader implements InputPort, LineSource {
  private readonly chunk: Buffer;
  private start = 0;
  private end = 0;
  private eof = false;

  constructor(private readonly fd: number, chunkSize = 4096, private readonly io: FdIo = nodeFdIo) {
    this.chunk = Buffer.alloc(chunkSize);
  }

  private fill(): boolean {
    if (this.eof) return false;
    for (let attempt = 0; ; attempt++) {
      try {
        const n = this.io.read(this.fd, this.chunk);
        if (n === 0) {
          this.eof = true;
          return false;
        }
        this.start = 0;
        this.end = n;
        return true;
      } catch (e) {
        const code = errnoCode(e);
        // non-blocking stdin reports EAGAIN until data arrives
        if (code === "EAGAIN") {
          this.io.sleep(retryDelay(attempt));
          continue;
        }
        if (code === "EOF") {
          this.eof = true;
          return false;
        }
        throw e;
      }
    }
  }

  readByte(): number | null {
    if (this.start >= this.end && !this.fill()) return null;
    return this.chunk[this.start++];
  }

  readLine(): string | null {
    const bytes: number[] = [];
    for (;;) {
      const b = this.readByte();
      if (b === null) {
        return bytes.length > 0 ? Buffer.from(bytes).toString("utf8") : null;
      }
      if (b === NEWLINE) break;
      bytes.push(b);
    }
    if (bytes[bytes.length - 1] === CARRIAGE_RETURN) bytes.pop();
    return Buffer.from(bytes).toString("utf8");
  }
}

/** Buffered synchronous writer; bytes leave in the order they were written. */
export class FdSink implements ByteSink {
  private readonly buf: Buffer;
  private len = 0;

  constructor(private readonly fd: number, capacity = 4096) {
    this.buf = Buffer.alloc(capacity);
  }

  write(byte: number): void {
    this.buf[this.len++] = byte;
    if (this.len === this.buf.length) this.flush();
  }

  /** Flush pending program output, then write text (prompts, banners). */
  writeText(text: string): void {
    this.flush();
    fs.writeSync(this.fd, text);
  }

  flush(): void {
    let off = 0;
    while (off < this.len) {
      off += fs.writeSync(this.fd, this.buf, off, this.len - off);
    }
    this.len = 0;
  }
}
