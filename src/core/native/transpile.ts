// src/core/native/transpile.ts
// Streaming brainfuck -> C transliteration with bracket balance checking

import { toBytes } from "../source/buffer";
import { LoopResolutionError, SourceLoadError, TapewormError, describeError } from "../errors";
import { CharCode } from "../machine/instructions";
import { EPILOGUE, prologue, snippetFor } from "./snippets";

export type SourceChunk = string | Uint8Array;

/** Anything that yields source chunks: a read stream, stdin, an array of strings. */
export type SourceChunks = AsyncIterable<SourceChunk> | Iterable<SourceChunk>;

/** Receives generated C text in order. */
export type CodeWriter = (text: string) => void | Promise<void>;

export type TranspileReport = {
  /** Instruction characters emitted */
  instructions: number;
  /** Deepest loop nesting seen */
  maxDepth: number;
};

/**
 * Incremental transpiler state. `feed` may be called with chunks of any size;
 * bracket depth and the (line, column) cursor carry across chunk boundaries.
 */
export class CTranspiler {
  private depth = 0;
  private maxDepth = 0;
  private instructions = 0;
  private line = 1;
  private column = 0;

  constructor(private readonly tapeSize: number) {}

  prologue(): string {
    return prologue(this.tapeSize);
  }

  /** Translate one chunk. Throws LoopResolutionError as soon as depth goes negative. */
  feed(chunk: SourceChunk): string {
    const bytes = toBytes(chunk);
    let out = "";

    for (let i = 0; i < bytes.length; i++) {
      const c = bytes[i];
      this.column++;
      if (c === CharCode.NEWLINE) {
        this.line++;
        this.column = 0;
        continue;
      }

      const code = snippetFor(c);
      if (code === undefined) continue;

      if (c === CharCode.LB) {
        this.depth++;
        if (this.depth > this.maxDepth) this.maxDepth = this.depth;
      } else if (c === CharCode.RB) {
        this.depth--;
        if (this.depth < 0) {
          throw new LoopResolutionError("unmatched-close", { line: this.line, column: this.column });
        }
      }

      this.instructions++;
      out += code;
    }

    return out;
  }

  /** Close the program. Throws LoopResolutionError if any loop is still open. */
  finish(): string {
    if (this.depth !== 0) {
      throw new LoopResolutionError("unmatched-open", { line: this.line, column: this.column });
    }
    return EPILOGUE;
  }

  report(): TranspileReport {
    return { instructions: this.instructions, maxDepth: this.maxDepth };
  }
}

/**
 * Stream `source` through a CTranspiler into `write`.
 * Errors raised while reading the source surface as SourceLoadError; errors from
 * the transpiler or the writer propagate unchanged.
 */
export async function transpile(
  source: SourceChunks,
  tapeSize: number,
  write: CodeWriter,
  sourceName = "<input>"
): Promise<TranspileReport> {
  const tr = new CTranspiler(tapeSize);
  await write(tr.prologue());

  try {
    for await (const chunk of source) {
      const code = tr.feed(chunk);
      if (code) await write(code);
    }
  } catch (e) {
    if (e instanceof TapewormError) throw e;
    throw new SourceLoadError(sourceName, describeError(e));
  }

  await write(tr.finish());
  return tr.report();
}

/** Whole-string convenience wrapper. */
export function transpileText(text: SourceChunk, tapeSize: number): string {
  const tr = new CTranspiler(tapeSize);
  return tr.prologue() + tr.feed(text) + tr.finish();
}
