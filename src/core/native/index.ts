// src/core/native/index.ts
export { SNIPPETS, EPILOGUE, prologue, snippetFor } from "./snippets";
export {
  CTranspiler,
  transpile,
  transpileText,
  type SourceChunk,
  type SourceChunks,
  type CodeWriter,
  type TranspileReport,
} from "./transpile";
export {
  spawnCompiler,
  splitFlags,
  compilerArgs,
  type CompilerInvocation,
  type CompilerResult,
  type CompilerRunner,
} from "./toolchain";
export {
  compileNative,
  defaultOutputPath,
  DEFAULT_C_OUTPUT,
  DEFAULT_BINARY_OUTPUT,
  type NativeTarget,
  type CompileRequest,
  type CompileReport,
} from "./compile";
