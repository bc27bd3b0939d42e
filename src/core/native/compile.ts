// src/core/native/compile.ts
// Native backend entry point: C text or a compiled executable

import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import * as os from "os";
import * as path from "path";

import type { NativeConfig } from "../config/config";
import { OutputError, ToolchainError, describeError } from "../errors";
import type { Outcome } from "../../outcome/outcome";
import { done, failFromError } from "../../outcome/constructors";
import { transpile, type SourceChunks } from "./transpile";
import { spawnCompiler, splitFlags, type CompilerRunner } from "./toolchain";

export type NativeTarget = "c" | "binary";

export const DEFAULT_C_OUTPUT = "a.out.c";
export const DEFAULT_BINARY_OUTPUT = "a.out";

export type CompileRequest = {
  source: SourceChunks;
  /** Used in error messages */
  sourceName?: string;
  target: NativeTarget;
  outputPath?: string;
  tapeSize: number;
  native: NativeConfig;
  runner?: CompilerRunner;
  /** Directory the temporary C file is created under (defaults to the OS temp dir) */
  tmpRoot?: string;
};

export type CompileReport = {
  target: NativeTarget;
  outputPath: string;
  instructions: number;
  maxDepth: number;
  /** Compiler stderr, kept for warnings on success */
  compilerStderr?: string;
};

export function defaultOutputPath(target: NativeTarget): string {
  return target === "c" ? DEFAULT_C_OUTPUT : DEFAULT_BINARY_OUTPUT;
}

/**
 * Compile a brainfuck source to C, or through the C compiler to an executable.
 * Never throws; every failure comes back as Fail.
 */
export async function compileNative(req: CompileRequest): Promise<Outcome<CompileReport>> {
  const started = Date.now();
  const outputPath = req.outputPath ?? defaultOutputPath(req.target);

  try {
    const report = req.target === "c"
      ? await emitC(req, outputPath)
      : await buildBinary(req, outputPath);
    return done(report, { durationMs: Date.now() - started });
  } catch (e) {
    return failFromError(e, { durationMs: Date.now() - started });
  }
}

// =========================================================================
// C text
// =========================================================================

async function emitC(req: CompileRequest, outputPath: string): Promise<CompileReport> {
  let handle: FileHandle;
  try {
    handle = await fs.open(outputPath, "w");
  } catch (e) {
    throw new OutputError(outputPath, describeError(e));
  }

  try {
    const stats = await transpile(
      req.source,
      req.tapeSize,
      async (text) => {
        try {
          await handle.write(text);
        } catch (e) {
          throw new OutputError(outputPath, describeError(e));
        }
      },
      req.sourceName
    );
    await handle.close();
    return { target: "c", outputPath, ...stats };
  } catch (e) {
    // the partial file must not survive a failed compile
    await handle.close().catch(() => undefined);
    await fs.rm(outputPath, { force: true });
    throw e;
  }
}

// =========================================================================
// Executable
// =========================================================================

async function buildBinary(req: CompileRequest, outputPath: string): Promise<CompileReport> {
  // Generate everything before touching the filesystem so an unbalanced
  // program never produces a temporary file.
  const parts: string[] = [];
  const stats = await transpile(req.source, req.tapeSize, (text) => { parts.push(text); }, req.sourceName);

  let dir: string;
  try {
    dir = await fs.mkdtemp(path.join(req.tmpRoot ?? os.tmpdir(), "tapeworm-"));
  } catch (e) {
    throw new OutputError(req.tmpRoot ?? os.tmpdir(), describeError(e));
  }

  const sourcePath = path.join(dir, "program.c");
  const runner = req.runner ?? spawnCompiler;

  try {
    try {
      await fs.writeFile(sourcePath, parts.join(""), "utf8");
    } catch (e) {
      throw new OutputError(sourcePath, describeError(e));
    }

    const result = await runner({
      compiler: req.native.compiler,
      flags: splitFlags(req.native.flags),
      sourcePath,
      outputPath,
    });

    if (!result.ok) {
      throw new ToolchainError(req.native.compiler, result, result.stderr);
    }

    return {
      target: "binary",
      outputPath,
      ...stats,
      compilerStderr: result.stderr || undefined,
    };
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
