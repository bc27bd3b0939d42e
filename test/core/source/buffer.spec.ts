// test/core/source/buffer.spec.ts

import { describe, it, expect } from "vitest";
import { SourceBuffer, toBytes } from "../../../src/core/source/buffer";

describe("SourceBuffer", () => {
  it("starts empty with the requested capacity", () => {
    const buf = new SourceBuffer(8);
    expect(buf.length).toBe(0);
    expect(buf.capacity).toBe(8);
    expect(buf.text()).toBe("");
  });

  it("returns the previous length from append", () => {
    const buf = new SourceBuffer(8);
    expect(buf.append("+++")).toBe(0);
    expect(buf.append("..")).toBe(3);
    expect(buf.text()).toBe("+++..");
  });

  it("doubles capacity until the appended text fits", () => {
    const buf = new SourceBuffer(4);
    buf.append("+++");
    buf.append("-----------");
    // 4 -> 8 -> 16
    expect(buf.capacity).toBe(16);
    expect(buf.length).toBe(14);
    expect(buf.text()).toBe("+++-----------");
  });

  it("keeps logical length apart from capacity", () => {
    const buf = new SourceBuffer(64);
    buf.append("[]");
    expect(buf.length).toBe(2);
    expect(buf.view()).toHaveLength(2);
  });

  it("reads bytes and rejects offsets past the end", () => {
    const buf = SourceBuffer.from("+-");
    expect(buf.byteAt(0)).toBe(0x2b);
    expect(buf.byteAt(1)).toBe(0x2d);
    expect(() => buf.byteAt(2)).toThrow(RangeError);
    expect(() => buf.byteAt(-1)).toThrow(RangeError);
  });

  it("truncates back to an earlier length", () => {
    const buf = SourceBuffer.from("+++\n[\n");
    buf.truncate(4);
    expect(buf.text()).toBe("+++\n");
    buf.append(".");
    expect(buf.text()).toBe("+++\n.");
  });

  it("refuses to truncate beyond the current length", () => {
    const buf = SourceBuffer.from("+");
    expect(() => buf.truncate(2)).toThrow(RangeError);
  });

  it("clears to zero length", () => {
    const buf = SourceBuffer.from("+++");
    buf.clear();
    expect(buf.length).toBe(0);
    expect(buf.indexOf(0x2b)).toBe(-1);
  });

  it("finds bytes with indexOf", () => {
    const buf = SourceBuffer.from("+!ab");
    expect(buf.indexOf(0x21)).toBe(1);
    expect(buf.indexOf(0x2b, 1)).toBe(-1);
  });

  it("accepts raw bytes", () => {
    const buf = SourceBuffer.from(Uint8Array.of(0x2b, 0x2e));
    expect(buf.text()).toBe("+.");
    expect(toBytes("+")).toEqual(Buffer.from([0x2b]));
  });
});
