// src/outcome/diagnostic.ts
// Structured diagnostics shared by the loop resolver, tape machine and native backend

export type DiagnosticSeverity = "error" | "warning";

/** A (line, column) location inside a source buffer. Lines and columns are 1-based. */
export interface SourcePosition {
  line: number;
  column: number;
  /** Byte offset into the source, when the diagnostic refers to a concrete byte. */
  offset?: number;
}

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  position?: SourcePosition;
  data?: Record<string, unknown>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

/**
 * Render a diagnostic the way the CLI prints it:
 * `Warning (3,14): Tape pointer underflow. Tape pointer set to zero.`
 */
export function formatDiagnostic(diag: Diagnostic): string {
  const label = diag.severity === "error" ? "Error" : "Warning";
  const where = diag.position ? ` (${diag.position.line},${diag.position.column})` : "";
  return `${label}${where}: ${diag.message}`;
}
