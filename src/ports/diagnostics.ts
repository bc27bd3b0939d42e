import { formatDiagnostic, type Diagnostic, type SourcePosition } from "../outcome/diagnostic";

/** Machine state captured by the '#' instruction. */
export interface TapeSnapshot {
  position: SourcePosition;
  pointer: number;
  instructionPointer: number;
  /** Cells 0 through the high-water mark, inclusive. */
  cells: number[];
}

/**
 * Diagnostic port interface.
 * A channel kept apart from program output for warnings, errors and dumps.
 */
export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
  dump(snapshot: TapeSnapshot): void;
}

export function formatSnapshot(snapshot: TapeSnapshot): string {
  const lines = [
    `Line: ${snapshot.position.line},${snapshot.position.column}`,
    `Tape pointer: ${snapshot.pointer}`,
    `Instruction pointer: ${snapshot.instructionPointer}`,
    "Memory map:",
  ];
  snapshot.cells.forEach((value, i) => lines.push(`${i}: ${value}`));
  return lines.join("\n");
}

export class ConsoleDiagnostics implements DiagnosticSink {
  report(diagnostic: Diagnostic): void {
    console.error(formatDiagnostic(diagnostic));
  }

  dump(snapshot: TapeSnapshot): void {
    console.error(formatSnapshot(snapshot));
  }
}

export class MemoryDiagnostics implements DiagnosticSink {
  readonly reports: Diagnostic[] = [];
  readonly dumps: TapeSnapshot[] = [];

  report(diagnostic: Diagnostic): void {
    this.reports.push(diagnostic);
  }

  dump(snapshot: TapeSnapshot): void {
    this.dumps.push(snapshot);
  }

  codes(): string[] {
    return this.reports.map((d) => d.code);
  }
}
