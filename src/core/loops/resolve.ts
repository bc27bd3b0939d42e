// src/core/loops/resolve.ts
// Single-pass bracket matcher producing a LoopTable

import type { SourceBuffer } from "../source/buffer";
import { toBytes, type SourceText } from "../source/buffer";
import { LoopResolutionError } from "../errors";
import { CharCode } from "../machine/instructions";
import { LoopTable, type BracketMarker } from "./table";

/**
 * Pair every '[' with its ']'.
 *
 * The cursor column is bumped for every byte before it is inspected, so the
 * first byte of a line sits at column 1; a newline resets the column to 0.
 * Throws LoopResolutionError at the first stray ']' (its position) or, if any
 * '[' is left open, at the position the scan ended on.
 */
export function resolveLoops(source: SourceBuffer | SourceText): LoopTable {
  const bytes = typeof source === "string" || source instanceof Uint8Array ? toBytes(source) : source.view();
  const table = new LoopTable();
  const stack: BracketMarker[] = [];
  let line = 1;
  let column = 0;

  for (let offset = 0; offset < bytes.length; offset++) {
    column++;
    const c = bytes[offset];
    if (c === CharCode.LB) {
      stack.push({ offset, line, column });
    } else if (c === CharCode.RB) {
      const open = stack.pop();
      if (!open) {
        throw new LoopResolutionError("unmatched-close", { line, column, offset });
      }
      table.add({ open, close: { offset, line, column } });
    } else if (c === CharCode.NEWLINE) {
      line++;
      column = 0;
    }
  }

  if (stack.length > 0) {
    throw new LoopResolutionError("unmatched-open", { line, column });
  }

  return table;
}
