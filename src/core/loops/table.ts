// src/core/loops/table.ts
// Bidirectional jump table between matched '[' and ']' offsets

import { InternalConsistencyError } from "../errors";

export interface BracketMarker {
  offset: number;
  line: number;
  column: number;
}

export interface LoopPair {
  open: BracketMarker;
  close: BracketMarker;
}

export class LoopTable {
  private readonly closeByOpen = new Map<number, number>();
  private readonly openByClose = new Map<number, number>();
  private readonly entries: LoopPair[] = [];

  static empty(): LoopTable {
    return new LoopTable();
  }

  add(pair: LoopPair): void {
    this.entries.push(pair);
    this.closeByOpen.set(pair.open.offset, pair.close.offset);
    this.openByClose.set(pair.close.offset, pair.open.offset);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Pairs in the order their closing brackets were scanned. */
  get pairs(): readonly LoopPair[] {
    return this.entries;
  }

  closeFor(openOffset: number): number {
    const close = this.closeByOpen.get(openOffset);
    if (close === undefined) throw new InternalConsistencyError(openOffset);
    return close;
  }

  openFor(closeOffset: number): number {
    const open = this.openByClose.get(closeOffset);
    if (open === undefined) throw new InternalConsistencyError(closeOffset);
    return open;
  }
}
