import type { InputPort } from "./source";
import type { ByteSink } from "./sink";
import type { DiagnosticSink } from "./diagnostics";
import { BufferInput } from "./source";
import { MemorySink } from "./sink";
import { MemoryDiagnostics } from "./diagnostics";
import type { SourceText } from "../core/source/buffer";

/**
 * Complete set of ports a session talks to.
 */
export interface PortSet {
  input: InputPort;
  output: ByteSink;
  diagnostics: DiagnosticSink;
}

export interface MemoryPortSet extends PortSet {
  input: BufferInput;
  output: MemorySink;
  diagnostics: MemoryDiagnostics;
}

/**
 * In-memory ports: program input from `data`, output and diagnostics collected.
 */
export function memoryPorts(data: SourceText = ""): MemoryPortSet {
  return {
    input: new BufferInput(data),
    output: new MemorySink(),
    diagnostics: new MemoryDiagnostics(),
  };
}
