import type { Diagnostic, DiagnosticSeverity, SourcePosition } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Unmatched closing bracket ']'." },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Unmatched opening bracket '['." },

  E0100: { code: "E0100", severity: "error", category: "Resource", template: "Cannot read source {path}: {reason}" },
  E0101: { code: "E0101", severity: "error", category: "Resource", template: "Cannot write output {path}: {reason}" },

  E0200: { code: "E0200", severity: "error", category: "Internal", template: "Loop table has no partner for offset {offset}" },

  E0300: { code: "E0300", severity: "error", category: "Toolchain", template: "Compiler {compiler} exited with {status}" },
  E0301: { code: "E0301", severity: "error", category: "Toolchain", template: "Compiler {compiler} could not be started: {reason}" },

  E0400: { code: "E0400", severity: "error", category: "Config", template: "Invalid configuration: {reason}" },

  W0001: { code: "W0001", severity: "warning", category: "Runtime", template: "Tape pointer overflow. Tape pointer set to zero." },
  W0002: { code: "W0002", severity: "warning", category: "Runtime", template: "Tape pointer underflow. Tape pointer set to zero." },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  position?: SourcePosition
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    position,
    data: params,
  };
}
