// src/core/source/position.ts
// Offset -> (line, column) conversion for diagnostics

import type { SourcePosition } from "../../outcome/diagnostic";
import type { SourceBuffer } from "./buffer";
import { toBytes, type SourceText } from "./buffer";

const NEWLINE = 0x0a;

/**
 * Indexes line starts of a source buffer and keeps that index in step with
 * appends. The first byte of a line is column 1; a newline byte belongs to the
 * line it ends.
 */
export class PositionTracker {
  private lineStarts: number[] = [0];
  private scanned = 0;

  /** Index any bytes appended since the last call. A shrunk buffer is re-indexed from scratch. */
  sync(source: SourceBuffer): void {
    if (source.length < this.scanned) this.reset();
    for (let i = this.scanned; i < source.length; i++) {
      if (source.byteAt(i) === NEWLINE) this.lineStarts.push(i + 1);
    }
    this.scanned = source.length;
  }

  reset(): void {
    this.lineStarts = [0];
    this.scanned = 0;
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  positionAt(offset: number): SourcePosition {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, column: offset - this.lineStarts[lo] + 1, offset };
  }

  /** Where a left-to-right scan ends up after the last indexed byte. */
  endPosition(): SourcePosition {
    const last = this.lineStarts[this.lineStarts.length - 1];
    return { line: this.lineStarts.length, column: this.scanned - last };
  }
}

export function positionOf(text: SourceText, offset: number): SourcePosition {
  const bytes = toBytes(text);
  let line = 1;
  let start = 0;
  for (let i = 0; i < offset && i < bytes.length; i++) {
    if (bytes[i] === NEWLINE) {
      line++;
      start = i + 1;
    }
  }
  return { line, column: offset - start + 1, offset };
}
