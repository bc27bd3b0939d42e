// test/core/machine/tape.spec.ts

import { describe, it, expect } from "vitest";
import { Tape } from "../../../src/core/machine/tape";

describe("Tape", () => {
  it("rejects sizes below one cell", () => {
    expect(() => new Tape(0)).toThrow(RangeError);
    expect(() => new Tape(2.5)).toThrow(RangeError);
  });

  it("wraps cell values modulo 256", () => {
    const tape = new Tape(1);
    tape.decrement();
    expect(tape.value).toBe(255);
    tape.increment();
    expect(tape.value).toBe(0);
  });

  it("clamps to zero when moving past the last cell", () => {
    const tape = new Tape(2);
    expect(tape.moveRight()).toBeUndefined();
    expect(tape.pointer).toBe(1);
    expect(tape.moveRight()).toBe("overflow");
    expect(tape.pointer).toBe(0);
  });

  it("clamps to zero when moving left of the first cell", () => {
    const tape = new Tape(4);
    expect(tape.moveLeft()).toBe("underflow");
    expect(tape.pointer).toBe(0);
  });

  it("tracks the furthest cell reached", () => {
    const tape = new Tape(8);
    tape.moveRight();
    tape.moveRight();
    tape.moveLeft();
    expect(tape.highWater).toBe(2);
    tape.value = 9;
    expect(tape.visited()).toEqual([0, 9, 0]);
  });

  it("resets cells, pointer and high-water mark", () => {
    const tape = new Tape(4);
    tape.moveRight();
    tape.increment();
    tape.reset();
    expect(tape.pointer).toBe(0);
    expect(tape.highWater).toBe(0);
    expect(Array.from(tape.cells)).toEqual([0, 0, 0, 0]);
  });
});
