// src/core/session/driver.ts
// One-shot and REPL drivers around a Session

import type { EngineConfig } from "../config/config";
import { CharCode } from "../machine/instructions";
import { toBytes, type SourceText } from "../source/buffer";
import { BufferInput, type LineSource } from "../../ports/source";
import type { PortSet } from "../../ports/composite";
import type { Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { done, failFromError } from "../../outcome/constructors";
import { Session, type TurnReport } from "./session";

// ─────────────────────────────────────────────────────────────────
// Inline input
// ─────────────────────────────────────────────────────────────────

export type SplitSource = {
  program: Uint8Array;
  /** Bytes after the first '!', or null when there is no separator */
  data: Uint8Array | null;
};

/** Split a source file at its first '!' into program text and program input. */
export function splitInlineInput(text: SourceText): SplitSource {
  const bytes = toBytes(text);
  const bang = bytes.indexOf(CharCode.BANG);
  if (bang < 0) return { program: bytes, data: null };
  return { program: bytes.subarray(0, bang), data: bytes.subarray(bang + 1) };
}

// ─────────────────────────────────────────────────────────────────
// One-shot mode
// ─────────────────────────────────────────────────────────────────

export type RunReport = TurnReport & {
  /** Data pointer when the program halted */
  pointer: number;
  /** Cells 0..highWater when the program halted */
  cells: number[];
};

/**
 * Load a whole program, resolve its loops once and run it to the end.
 * Session state is released before returning; the report keeps the final tape.
 */
export function runProgram(text: SourceText, params: EngineConfig, ports: PortSet): Outcome<RunReport> {
  const started = Date.now();
  let program: SourceText = text;
  let sessionPorts = ports;

  if (params.inlineInput) {
    const split = splitInlineInput(text);
    program = split.program;
    if (split.data !== null) {
      sessionPorts = { ...ports, input: new BufferInput(split.data) };
    }
  }

  // '@' only has meaning in REPL sessions
  const session = new Session({ ...params, repl: false }, sessionPorts);
  try {
    session.load(program);
    const turn = session.run();
    return done(
      { ...turn, pointer: session.tape.pointer, cells: session.tape.visited() },
      { steps: turn.steps, durationMs: Date.now() - started }
    );
  } catch (e) {
    return failFromError(e, { steps: session.machine.steps, durationMs: Date.now() - started });
  } finally {
    session.dispose();
  }
}

// ─────────────────────────────────────────────────────────────────
// REPL mode
// ─────────────────────────────────────────────────────────────────

export type ReplOptions = {
  lines: LineSource;
  /** Writes the prompt before each line is read */
  prompt?: (text: string) => void;
  promptText?: string;
};

export type ReplSummary = {
  turns: number;
  failedTurns: number;
  resets: number;
};

export class ReplDriver {
  readonly session: Session;
  private turns = 0;
  private failedTurns = 0;

  constructor(params: EngineConfig, ports: PortSet, private readonly options: ReplOptions) {
    this.session = new Session({ ...params, repl: true }, ports);
  }

  /** Run one line through the session. Failures are reported on the diagnostic sink. */
  turn(line: string): Outcome<TurnReport> {
    this.turns++;
    const outcome = this.session.feed(line.endsWith("\n") ? line : `${line}\n`);
    if (isFail(outcome)) {
      this.failedTurns++;
      for (const diag of outcome.failure.diagnostics) {
        this.session.ports.diagnostics.report(diag);
      }
    }
    return outcome;
  }

  /** Prompt, read and execute until the line source closes. */
  run(): ReplSummary {
    const promptText = this.options.promptText ?? "> ";

    for (;;) {
      this.options.prompt?.(promptText);
      const line = this.options.lines.readLine();
      if (line === null) break;
      this.turn(line);
    }

    return this.summary();
  }

  summary(): ReplSummary {
    return { turns: this.turns, failedTurns: this.failedTurns, resets: this.session.resetCount };
  }

  close(): void {
    this.session.dispose();
  }
}
