// src/core/session/session.ts
// One run of the engine: owns the source buffer, loop table, tape and machine.
// Nothing here is process-wide, so independent sessions can coexist.

import type { EngineConfig } from "../config/config";
import { SourceBuffer, type SourceText } from "../source/buffer";
import { PositionTracker } from "../source/position";
import { LoopTable } from "../loops/table";
import { resolveLoops } from "../loops/resolve";
import { Tape } from "../machine/tape";
import { TapeMachine, type MachineStatus, type Program } from "../machine/machine";
import type { PortSet } from "../../ports/composite";
import type { TapeSnapshot } from "../../ports/diagnostics";
import type { Outcome } from "../../outcome/outcome";
import { done, failFromError } from "../../outcome/constructors";

export type TurnReport = {
  /** Offset the machine started from this turn */
  from: number;
  /** Source length when the turn ended */
  to: number;
  /** Instructions executed during the turn */
  steps: number;
  /** True if '@' cleared the session during the turn */
  reset: boolean;
  status: MachineStatus;
};

export class Session implements Program {
  readonly source: SourceBuffer;
  readonly positions = new PositionTracker();
  loops: LoopTable = LoopTable.empty();
  readonly tape: Tape;
  readonly machine: TapeMachine;
  private resets = 0;

  constructor(readonly params: EngineConfig, readonly ports: PortSet) {
    this.source = new SourceBuffer(params.inputMax);
    this.tape = new Tape(params.tapeSize);
    this.machine = new TapeMachine({
      tape: this.tape,
      input: ports.input,
      output: ports.output,
      diagnostics: ports.diagnostics,
      eofBehavior: params.eofBehavior,
      debug: params.debug,
      extendedInstructions: params.extendedInstructions,
      repl: params.repl,
      onReset: () => {
        this.resets++;
        this.clearProgram();
      },
    });
  }

  /** Number of times '@' has cleared this session. */
  get resetCount(): number {
    return this.resets;
  }

  /**
   * Append the whole program and resolve its loops.
   * Throws LoopResolutionError on unbalanced brackets.
   */
  load(text: SourceText): void {
    this.source.append(text);
    this.positions.sync(this.source);
    this.loops = resolveLoops(this.source);
  }

  /** Drive the machine from its current instruction pointer to the end of the source. */
  run(): TurnReport {
    const from = this.machine.ip;
    const steps0 = this.machine.steps;
    const resets0 = this.resets;
    const status = this.machine.run(this);
    return {
      from,
      to: this.source.length,
      steps: this.machine.steps - steps0,
      reset: this.resets !== resets0,
      status,
    };
  }

  /**
   * REPL turn: append text, rebuild the loop table over the whole buffer and
   * execute only what was appended. If the brackets no longer balance the
   * append is rolled back and the tape is left exactly as it was.
   */
  feed(text: SourceText): Outcome<TurnReport> {
    const before = this.source.append(text);
    this.positions.sync(this.source);

    try {
      this.loops = resolveLoops(this.source);
    } catch (e) {
      this.source.truncate(before);
      this.positions.sync(this.source);
      return failFromError(e);
    }

    try {
      const report = this.run();
      return done(report, { steps: report.steps });
    } catch (e) {
      return failFromError(e, { steps: this.machine.steps });
    }
  }

  snapshot(): TapeSnapshot {
    return this.machine.snapshot(this);
  }

  /** Zero everything the session owns. */
  dispose(): void {
    this.ports.output.flush();
    this.clearProgram();
    this.tape.reset();
    this.machine.ip = 0;
  }

  private clearProgram(): void {
    this.source.clear();
    this.positions.reset();
    this.loops = LoopTable.empty();
  }
}
