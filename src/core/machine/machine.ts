// src/core/machine/machine.ts
// Tape machine: executes one instruction per step against a program and a tape

import type { SourceBuffer } from "../source/buffer";
import type { PositionTracker } from "../source/position";
import type { LoopTable } from "../loops/table";
import type { EofBehavior } from "../config/config";
import type { InputPort } from "../../ports/source";
import type { ByteSink } from "../../ports/sink";
import type { DiagnosticSink, TapeSnapshot } from "../../ports/diagnostics";
import { makeDiagnostic } from "../../outcome/codes";
import { CharCode } from "./instructions";
import type { Tape } from "./tape";

export type MachineStatus = "running" | "awaiting-input" | "halted" | "faulted";

/** What the machine executes: the source, its loop table and a position index over it. */
export interface Program {
  source: SourceBuffer;
  loops: LoopTable;
  positions: PositionTracker;
}

export type MachineOptions = {
  tape: Tape;
  input: InputPort;
  output: ByteSink;
  diagnostics: DiagnosticSink;
  eofBehavior: EofBehavior;
  debug: boolean;
  extendedInstructions: boolean;
  repl: boolean;
  /**
   * Invoked by '@' to clear the program (source, loop table, positions).
   * The machine resets the tape and its own pointers itself.
   */
  onReset?: () => void;
};

export class TapeMachine {
  /** Offset of the next instruction. */
  ip = 0;
  /** False once the input port has reported end of input. */
  receiving = true;
  status: MachineStatus = "running";
  steps = 0;

  constructor(private readonly opts: MachineOptions) {}

  get tape(): Tape {
    return this.opts.tape;
  }

  /**
   * Execute the instruction at `ip` and advance.
   * Jumps land on the partner bracket, which the advance then steps past.
   */
  step(program: Program): MachineStatus {
    if (this.ip >= program.source.length) {
      this.status = "halted";
      return this.status;
    }

    const { tape } = this.opts;
    let next = this.ip + 1;
    this.steps++;

    switch (program.source.byteAt(this.ip)) {
      case CharCode.ADD:
        tape.increment();
        break;
      case CharCode.SUB:
        tape.decrement();
        break;
      case CharCode.GT:
        if (tape.moveRight() === "overflow") this.warn("W0001", program);
        break;
      case CharCode.LT:
        if (tape.moveLeft() === "underflow") this.warn("W0002", program);
        break;
      case CharCode.COMMA:
        this.read();
        break;
      case CharCode.DOT:
        this.opts.output.write(tape.value);
        break;
      case CharCode.LB:
        if (tape.value === 0) next = program.loops.closeFor(this.ip) + 1;
        break;
      case CharCode.RB:
        if (tape.value !== 0) next = program.loops.openFor(this.ip) + 1;
        break;
      case CharCode.HASH:
        if (this.opts.debug && this.opts.extendedInstructions) {
          this.opts.diagnostics.dump(this.snapshot(program));
        }
        break;
      case CharCode.AT:
        if (this.opts.repl && this.opts.extendedInstructions) {
          this.reset();
          next = 0;
        }
        break;
    }

    this.ip = next;
    this.status = this.ip >= program.source.length ? "halted" : "running";
    return this.status;
  }

  /** Step until the instruction pointer reaches the end of the program. */
  run(program: Program): MachineStatus {
    try {
      while (this.step(program) === "running");
    } catch (e) {
      this.status = "faulted";
      throw e;
    } finally {
      this.opts.output.flush();
    }
    return this.status;
  }

  snapshot(program: Program): TapeSnapshot {
    return {
      position: program.positions.positionAt(this.ip),
      pointer: this.opts.tape.pointer,
      instructionPointer: this.ip,
      cells: this.opts.tape.visited(),
    };
  }

  private read(): void {
    const { tape, input, output, eofBehavior } = this.opts;

    if (this.receiving) {
      this.status = "awaiting-input";
      output.flush();
      const byte = input.readByte();
      this.status = "running";
      if (byte !== null) {
        tape.value = byte;
        return;
      }
      this.receiving = false;
    }

    switch (eofBehavior) {
      case "zero":
        tape.value = 0;
        break;
      case "decrement":
        tape.decrement();
        break;
      case "unchanged":
        break;
    }
  }

  private warn(code: "W0001" | "W0002", program: Program): void {
    this.opts.diagnostics.report(makeDiagnostic(code, undefined, program.positions.positionAt(this.ip)));
  }

  private reset(): void {
    this.opts.onReset?.();
    this.opts.tape.reset();
    this.ip = 0;
  }
}
