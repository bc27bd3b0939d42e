// src/core/machine/tape.ts
// Fixed-length byte tape with a data pointer and a high-water mark

export type PointerFault = "overflow" | "underflow";

export class Tape {
  readonly cells: Uint8Array;
  private ptr = 0;
  private high = 0;

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`tape size must be a positive integer, got ${size}`);
    }
    this.cells = new Uint8Array(size);
  }

  get pointer(): number {
    return this.ptr;
  }

  /** Furthest cell the pointer has reached since the last reset. */
  get highWater(): number {
    return this.high;
  }

  get value(): number {
    return this.cells[this.ptr];
  }

  set value(v: number) {
    this.cells[this.ptr] = v;
  }

  // Uint8Array stores modulo 256, so 255 + 1 lands on 0 and 0 - 1 on 255
  increment(): void {
    this.cells[this.ptr]++;
  }

  decrement(): void {
    this.cells[this.ptr]--;
  }

  /** Move right; stepping off the end clamps the pointer back to 0. */
  moveRight(): PointerFault | undefined {
    const next = this.ptr + 1;
    if (next >= this.size) {
      this.ptr = 0;
      return "overflow";
    }
    this.ptr = next;
    if (next > this.high) this.high = next;
    return undefined;
  }

  /** Move left; stepping below 0 clamps the pointer to 0. */
  moveLeft(): PointerFault | undefined {
    const next = this.ptr - 1;
    if (next < 0) {
      this.ptr = 0;
      return "underflow";
    }
    this.ptr = next;
    return undefined;
  }

  /** Cells 0..highWater inclusive. */
  visited(): number[] {
    return Array.from(this.cells.subarray(0, this.high + 1));
  }

  reset(): void {
    this.cells.fill(0);
    this.ptr = 0;
    this.high = 0;
  }
}
