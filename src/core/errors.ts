// src/core/errors.ts
// Typed errors thrown inside the engine; top-level operations turn them into Failures

import type { Diagnostic, SourcePosition } from "../outcome/diagnostic";
import { makeDiagnostic } from "../outcome/codes";

export class TapewormError extends Error {
  constructor(message: string, public readonly code: string, public readonly diagnostic: Diagnostic) {
    super(message);
    this.name = "TapewormError";
  }
}

export type BracketFault = "unmatched-close" | "unmatched-open";

export class LoopResolutionError extends TapewormError {
  constructor(
    public readonly fault: BracketFault,
    public readonly position: SourcePosition
  ) {
    const diag = makeDiagnostic(fault === "unmatched-close" ? "E0001" : "E0002", undefined, position);
    super(diag.message, diag.code, diag);
    this.name = "LoopResolutionError";
  }
}

export class SourceLoadError extends TapewormError {
  constructor(public readonly path: string, reason: string) {
    const diag = makeDiagnostic("E0100", { path, reason });
    super(diag.message, diag.code, diag);
    this.name = "SourceLoadError";
  }
}

export class OutputError extends TapewormError {
  constructor(public readonly path: string, reason: string) {
    const diag = makeDiagnostic("E0101", { path, reason });
    super(diag.message, diag.code, diag);
    this.name = "OutputError";
  }
}

export type ToolchainExit = {
  exitCode: number | null;
  /** Signal that killed the compiler, if any */
  signal?: string;
  /** Set when the compiler could not be started */
  error?: string;
};

export class ToolchainError extends TapewormError {
  readonly exitCode: number | null;
  readonly signal?: string;

  constructor(
    public readonly compiler: string,
    exit: ToolchainExit,
    public readonly stderr: string
  ) {
    const diag = exit.error !== undefined
      ? makeDiagnostic("E0301", { compiler, reason: exit.error })
      : makeDiagnostic("E0300", { compiler, status: exitStatus(exit) });
    super(diag.message, diag.code, diag);
    this.name = "ToolchainError";
    this.exitCode = exit.exitCode;
    this.signal = exit.signal;
  }
}

function exitStatus(exit: ToolchainExit): string {
  if (exit.exitCode !== null) return `code ${exit.exitCode}`;
  if (exit.signal) return `signal ${exit.signal}`;
  return "no exit status";
}

/** A loop lookup that found no partner. Only reachable if the loop table is corrupt. */
export class InternalConsistencyError extends TapewormError {
  constructor(public readonly offset: number) {
    const diag = makeDiagnostic("E0200", { offset });
    super(diag.message, diag.code, diag);
    this.name = "InternalConsistencyError";
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
