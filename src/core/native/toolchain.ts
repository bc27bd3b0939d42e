// src/core/native/toolchain.ts
// External C compiler invocation

import { spawn } from "child_process";

export type CompilerInvocation = {
  compiler: string;
  flags: string[];
  sourcePath: string;
  outputPath: string;
};

export type CompilerResult = {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Signal that terminated the compiler */
  signal?: string;
  /** Set when the compiler could not be started */
  error?: string;
};

/** Runs a compiler invocation. Swappable so tests never need a real C toolchain. */
export type CompilerRunner = (inv: CompilerInvocation) => Promise<CompilerResult>;

export function splitFlags(flags: string): string[] {
  return flags.split(/\s+/).filter((f) => f.length > 0);
}

/** `<flags…> -o <output> <source>` */
export function compilerArgs(inv: CompilerInvocation): string[] {
  return [...inv.flags, "-o", inv.outputPath, inv.sourcePath];
}

export const spawnCompiler: CompilerRunner = (inv) => {
  return new Promise((resolve) => {
    const child = spawn(inv.compiler, compilerArgs(inv), { stdio: "pipe", shell: process.platform === "win32" });

    let stdout = "";
    let stderr = "";

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");

    child.stdout.on("data", (d: string) => { stdout += d; });
    child.stderr.on("data", (d: string) => { stderr += d; });

    child.on("close", (code, signal) => {
      resolve({ ok: code === 0, exitCode: code, signal: signal ?? undefined, stdout, stderr });
    });

    child.on("error", (err) => {
      resolve({ ok: false, exitCode: null, stdout, stderr, error: err.message });
    });
  });
};
