import { describe, expect, it, vi, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ArrayLineSource, BufferInput } from "../../src/ports/source";
import { MemorySink } from "../../src/ports/sink";
import { FdReader, FdSink, retryDelay, type FdIo } from "../../src/ports/fd";
import { ConsoleDiagnostics, MemoryDiagnostics } from "../../src/ports/diagnostics";
import { memoryPorts } from "../../src/ports/composite";
import { makeDiagnostic } from "../../src/outcome/codes";

describe("in-memory ports", () => {
  it("reads input bytes until exhausted", () => {
    const input = new BufferInput("hi");
    expect(input.readByte()).toBe(0x68);
    expect(input.remaining).toBe(1);
    expect(input.readByte()).toBe(0x69);
    expect(input.readByte()).toBeNull();
  });

  it("serves lines from an array", () => {
    const lines = new ArrayLineSource(["+", "."]);
    expect(lines.readLine()).toBe("+");
    expect(lines.readLine()).toBe(".");
    expect(lines.readLine()).toBeNull();
  });

  it("collects output bytes as they are written", () => {
    const sink = new MemorySink();
    sink.write(72);
    sink.write(256 + 105);
    sink.flush();
    expect(sink.text()).toBe("Hi");
    expect(sink.flushes).toBe(1);
    sink.clear();
    expect(sink.data()).toHaveLength(0);
  });

  it("builds a complete port set", () => {
    const ports = memoryPorts("x");
    expect(ports.input.readByte()).toBe(0x78);
    ports.diagnostics.report(makeDiagnostic("W0001"));
    expect(ports.diagnostics.codes()).toEqual(["W0001"]);
  });
});

describe("file descriptor ports", () => {
  let dir: string | undefined;

  function tempFile(name: string, content = ""): string {
    const base = dir ?? fs.mkdtempSync(path.join(os.tmpdir(), "tapeworm-fd-"));
    dir = base;
    const file = path.join(base, name);
    fs.writeFileSync(file, content);
    return file;
  }

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("interleaves line and byte reads from one buffer", () => {
    const fd = fs.openSync(tempFile("in.txt", "ab\r\ncd\nlast"), "r");
    try {
      // a tiny chunk forces several refills
      const reader = new FdReader(fd, 3);
      expect(reader.readLine()).toBe("ab");
      expect(reader.readByte()).toBe(0x63);
      expect(reader.readLine()).toBe("d");
      expect(reader.readLine()).toBe("last");
      expect(reader.readLine()).toBeNull();
      expect(reader.readByte()).toBeNull();
    } finally {
      fs.closeSync(fd);
    }
  });

  it("returns an empty line for a bare newline", () => {
    const fd = fs.openSync(tempFile("blank.txt", "\n"), "r");
    try {
      const reader = new FdReader(fd);
      expect(reader.readLine()).toBe("");
      expect(reader.readLine()).toBeNull();
    } finally {
      fs.closeSync(fd);
    }
  });

  it("waits longer after each EAGAIN before reading again", () => {
    const busy = Object.assign(new Error("resource temporarily unavailable"), { code: "EAGAIN" });
    let calls = 0;
    const sleeps: number[] = [];
    const io: FdIo = {
      read: (_fd, buffer) => {
        calls++;
        if (calls <= 3) throw busy;
        buffer[0] = 0x41;
        return 1;
      },
      sleep: (ms) => {
        sleeps.push(ms);
      },
    };

    const reader = new FdReader(0, 8, io);
    expect(reader.readByte()).toBe(0x41);
    expect(sleeps).toEqual([1, 2, 4]);
  });

  it("caps the EAGAIN wait", () => {
    expect([0, 1, 5, 6, 40].map(retryDelay)).toEqual([1, 2, 32, 50, 50]);
  });

  it("writes bytes in order and flushes when the buffer fills", () => {
    const file = tempFile("out.txt");
    const fd = fs.openSync(file, "w");
    const sink = new FdSink(fd, 2);
    sink.write(0x78);
    sink.write(0x79);
    // the buffer filled and went out
    expect(fs.readFileSync(file, "utf8")).toBe("xy");
    sink.write(0x7a);
    sink.writeText("!");
    sink.flush();
    fs.closeSync(fd);
    expect(fs.readFileSync(file, "utf8")).toBe("xyz!");
  });
});

describe("diagnostic sinks", () => {
  it("prints formatted diagnostics and dumps to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    try {
      const sink = new ConsoleDiagnostics();
      sink.report(makeDiagnostic("W0002", undefined, { line: 2, column: 5 }));
      sink.dump({ position: { line: 1, column: 2 }, pointer: 0, instructionPointer: 1, cells: [7] });
      expect(spy.mock.calls).toEqual([
        ["Warning (2,5): Tape pointer underflow. Tape pointer set to zero."],
        ["Line: 1,2\nTape pointer: 0\nInstruction pointer: 1\nMemory map:\n0: 7"],
      ]);
    } finally {
      spy.mockRestore();
    }
  });

  it("keeps reports and dumps in memory", () => {
    const sink = new MemoryDiagnostics();
    sink.dump({ position: { line: 1, column: 1 }, pointer: 0, instructionPointer: 0, cells: [0] });
    expect(sink.dumps).toHaveLength(1);
    expect(sink.reports).toEqual([]);
  });
});
