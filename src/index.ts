// src/index.ts
// tapeworm - Public API
//
// Interpreter, REPL driver and C backend for brainfuck programs.

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export { SourceBuffer, toBytes, type SourceText } from "./core/source/buffer";
export { PositionTracker, positionOf } from "./core/source/position";
export { LoopTable, type LoopPair, type BracketMarker } from "./core/loops/table";
export { resolveLoops } from "./core/loops/resolve";
export { Tape, type PointerFault } from "./core/machine/tape";
export { TapeMachine, type MachineStatus, type MachineOptions, type Program } from "./core/machine/machine";
export { CharCode } from "./core/machine/instructions";

// ═══════════════════════════════════════════════════════════════════════════════
// SESSIONS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/session";

// ═══════════════════════════════════════════════════════════════════════════════
// NATIVE BACKEND
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/native";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS
// ═══════════════════════════════════════════════════════════════════════════════

export { BufferInput, ArrayLineSource, type InputPort, type LineSource } from "./ports/source";
export { MemorySink, type ByteSink } from "./ports/sink";
export { FdReader, FdSink } from "./ports/fd";
export {
  ConsoleDiagnostics,
  MemoryDiagnostics,
  formatSnapshot,
  type DiagnosticSink,
  type TapeSnapshot,
} from "./ports/diagnostics";
export { memoryPorts, type PortSet, type MemoryPortSet } from "./ports/composite";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export { isDone, isFail, type Outcome, type Done, type Fail, type OutcomeMeta } from "./outcome/outcome";
export { failure, type Failure, type FailureReason } from "./outcome/failure";
export { formatDiagnostic, type Diagnostic, type DiagnosticSeverity, type SourcePosition } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export { done, fail, failureFromError } from "./outcome/constructors";
export { match, mapOutcome, unwrap, unwrapOr } from "./outcome/matchers";
export {
  TapewormError,
  LoopResolutionError,
  SourceLoadError,
  OutputError,
  ToolchainError,
  type ToolchainExit,
  InternalConsistencyError,
  type BracketFault,
} from "./core/errors";
