#!/usr/bin/env node
// bin/tapeworm.ts
// tapeworm CLI - run, REPL and native compile modes
//
// Run:  npx tsx bin/tapeworm.ts [options] [file]

import * as fs from "fs";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  type CliConfig,
} from "./tapeworm-cli-lib";
import {
  resolveConfig,
  runProgram,
  ReplDriver,
  compileNative,
  FdReader,
  FdSink,
  ConsoleDiagnostics,
  SourceLoadError,
  formatDiagnostic,
  failureFromError,
  type Failure,
  type TapewormConfig,
  match,
  type Outcome,
} from "../src";

const STDIN = 0;
const STDOUT = 1;

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<number> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return 0;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return 0;
  }

  const cli = buildConfig(cliArgs);
  if (cli.usageError) {
    console.error(`Error: ${cli.usageError}`);
    console.error("Try 'tapeworm --help' for more information.");
    return 1;
  }

  const resolved = resolveConfig({ configFile: cli.configFile, overrides: cli.overrides });
  if (resolved.tag === "Fail") return report(resolved.failure, cli.verbose);
  const { config, warnings } = resolved.value;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  if (cli.verbose) {
    console.error(`Mode: ${cli.mode}`);
    console.error(`Tape: ${config.engine.tapeSize} cells, EOF ${config.engine.eofBehavior}`);
    console.error(`Extended: ${config.engine.extendedInstructions}, debug: ${config.engine.debug}`);
    if (cli.mode === "compile") {
      console.error(`Compiler: ${config.native.compiler} ${config.native.flags}`);
    }
  }

  switch (cli.mode) {
    case "run":
      return runMode(cli, config);
    case "repl":
      return replMode(config);
    case "compile":
    case "emit":
      return compileMode(cli, config);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUN MODE
// ═══════════════════════════════════════════════════════════════════════════════

function runMode(cli: CliConfig, config: TapewormConfig): number {
  const file = cli.file ?? "";
  let text: Buffer;
  try {
    text = fs.readFileSync(file);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return report(failureFromError(new SourceLoadError(file, reason)));
  }

  const sink = new FdSink(STDOUT);
  const outcome = runProgram(text, config.engine, {
    input: new FdReader(STDIN),
    output: sink,
    diagnostics: new ConsoleDiagnostics(),
  });
  sink.flush();

  return exitCode(outcome, cli.verbose);
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL MODE
// ═══════════════════════════════════════════════════════════════════════════════

function replMode(config: TapewormConfig): number {
  // prompt lines and ',' share one stdin buffer
  const reader = new FdReader(STDIN);
  const sink = new FdSink(STDOUT);

  const driver = new ReplDriver(
    config.engine,
    { input: reader, output: sink, diagnostics: new ConsoleDiagnostics() },
    { lines: reader, prompt: (text) => sink.writeText(text) }
  );

  try {
    driver.run();
    sink.writeText("\n");
  } finally {
    driver.close();
  }
  return 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMPILE MODES
// ═══════════════════════════════════════════════════════════════════════════════

async function compileMode(cli: CliConfig, config: TapewormConfig): Promise<number> {
  const source = cli.file ? fs.createReadStream(cli.file) : process.stdin;

  const outcome = await compileNative({
    source,
    sourceName: cli.file ?? "<stdin>",
    target: cli.mode === "emit" ? "c" : "binary",
    outputPath: cli.outputPath,
    tapeSize: config.engine.tapeSize,
    native: config.native,
  });

  if (cli.verbose && outcome.tag === "Done") {
    const { outputPath, instructions, maxDepth } = outcome.value;
    console.error(`Wrote ${outputPath} (${instructions} instructions, loop depth ${maxDepth})`);
  }
  if (outcome.tag === "Done" && outcome.value.compilerStderr) {
    process.stderr.write(outcome.value.compilerStderr);
  }

  return exitCode(outcome, cli.verbose);
}

// ═══════════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════════

function report(f: Failure, verbose = false): number {
  for (const diag of f.diagnostics) {
    console.error(formatDiagnostic(diag));
  }
  const stderr = f.context?.stderr;
  if (typeof stderr === "string" && stderr !== "") {
    process.stderr.write(stderr);
  }
  if (verbose) {
    console.error(`(${f.reason})`);
  }
  return 1;
}

function exitCode<A>(outcome: Outcome<A>, verbose: boolean): number {
  return match(outcome, {
    done: (d) => {
      if (verbose && d.meta.steps !== undefined) {
        console.error(`Executed ${d.meta.steps} instructions in ${d.meta.durationMs ?? 0}ms`);
      }
      return 0;
    },
    fail: (f) => report(f.failure, verbose),
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error("Fatal error:", error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
