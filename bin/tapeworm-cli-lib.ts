// bin/tapeworm-cli-lib.ts
// Shared CLI utilities for the tapeworm command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";

import { isEofBehavior, EOF_BEHAVIORS, type ConfigOverrides, type EofBehavior } from "../src/core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliMode = "run" | "repl" | "compile" | "emit";

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  repl?: boolean;
  compile?: boolean;
  emitC?: boolean;
  output?: string;
  debug?: boolean;
  strict?: boolean;
  eof?: EofBehavior;
  tapeSize?: number;
  inlineInput?: boolean;
  configFile?: string;
  verbose?: boolean;
  file?: string;
  /** First usage problem found while parsing */
  usageError?: string;
};

export type CliConfig = {
  mode: CliMode;
  file?: string;
  outputPath?: string;
  configFile?: string;
  verbose: boolean;
  /** Applied on top of defaults, environment and config file */
  overrides: ConfigOverrides;
  usageError?: string;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};
  const usage = (message: string) => {
    result.usageError ??= message;
  };

  const valueFor = (flag: string, i: number): string | undefined => {
    const value = args[i];
    if (value === undefined) {
      usage(`Option ${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--repl" || arg === "-r") {
      result.repl = true;
    } else if (arg === "--compile" || arg === "-c") {
      result.compile = true;
    } else if (arg === "--emit-c" || arg === "-C") {
      result.emitC = true;
    } else if (arg === "--debug" || arg === "-d") {
      result.debug = true;
    } else if (arg === "--strict" || arg === "-s") {
      result.strict = true;
    } else if (arg === "--inline-input" || arg === "-i") {
      result.inlineInput = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--output" || arg === "-o") {
      result.output = valueFor(arg, ++i);
    } else if (arg === "--config") {
      result.configFile = valueFor(arg, ++i);
    } else if (arg === "--eof" || arg === "-e") {
      const value = valueFor(arg, ++i);
      if (value === undefined) continue;
      if (isEofBehavior(value)) {
        result.eof = value;
      } else {
        usage(`Unknown EOF policy '${value}' (expected ${EOF_BEHAVIORS.join(", ")})`);
      }
    } else if (arg === "--tape-size" || arg === "-t") {
      const value = valueFor(arg, ++i);
      if (value === undefined) continue;
      const n = Number(value);
      if (Number.isInteger(n) && n > 0) {
        result.tapeSize = n;
      } else {
        usage(`Tape size must be a positive integer, got '${value}'`);
      }
    } else if (arg.startsWith("-") && arg !== "-") {
      usage(`Unknown option ${arg}`);
    } else if (!result.file) {
      // First non-flag argument is the file
      result.file = arg;
    } else {
      usage(`Unexpected argument ${arg}`);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
tapeworm - brainfuck interpreter, REPL and C compiler

USAGE:
  tapeworm [options] <file>           Run a program
  tapeworm -r [options]               Start the interactive REPL
  tapeworm -c [options] [file]        Compile to a native executable (stdin without file)
  tapeworm -C [options] [file]        Compile to C source (stdin without file)

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -r, --repl                         Read-eval-print loop
  -c, --compile                      Compile through the C compiler
  -C, --emit-c                       Write C source instead of an executable
  -o, --output <path>                Output path (default a.out or a.out.c)
  -d, --debug                        Enable '#' memory dumps
  -s, --strict                       Disable the '#' and '@' extensions
  -e, --eof <policy>                 EOF policy for ',': zero, decrement, unchanged
  -t, --tape-size <n>                Number of tape cells (default 30000)
  -i, --inline-input                 Program input follows the first '!' in the file
  --config <file>                    Load configuration from file
  --verbose                          Show mode and configuration details

EXTENDED INSTRUCTIONS:
  #                                  Dump the tape (with --debug)
  @                                  Clear program and tape (REPL only)

ENVIRONMENT:
  TAPEWORM_TAPE_SIZE, TAPEWORM_INPUT_MAX, TAPEWORM_EOF, TAPEWORM_EXTENDED,
  TAPEWORM_DEBUG, TAPEWORM_INLINE_INPUT, TAPEWORM_CC, TAPEWORM_CFLAGS

EXAMPLES:
  tapeworm hello.b                   # Run a program
  tapeworm -d -e unchanged prog.b    # Debug dumps, leave cells alone at EOF
  tapeworm -C -o hello.c hello.b     # Translate to C
  cat prog.b | tapeworm -c           # Compile stdin to ./a.out
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  // bin/ from sources, dist/bin/ once built
  for (const up of ["..", path.join("..", "..")]) {
    try {
      const pkgPath = path.join(__dirname, up, "package.json");
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return `tapeworm v${pkg.version}`;
      }
    } catch {
      continue;
    }
  }
  return "tapeworm v0.3.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

/** Compile flags win over -r; -C wins over -c. */
export function detectMode(args: Partial<CliArgs>): CliMode {
  if (args.emitC) return "emit";
  if (args.compile) return "compile";
  if (args.repl) return "repl";
  return "run";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const mode = detectMode(args);

  const engine: NonNullable<ConfigOverrides["engine"]> = {};
  if (args.debug) engine.debug = true;
  if (args.strict) engine.extendedInstructions = false;
  if (args.inlineInput) engine.inlineInput = true;
  if (args.eof) engine.eofBehavior = args.eof;
  if (args.tapeSize !== undefined) engine.tapeSize = args.tapeSize;
  engine.repl = mode === "repl";

  const config: CliConfig = {
    mode,
    verbose: args.verbose || false,
    overrides: { engine },
    usageError: args.usageError,
  };

  if (args.file) config.file = args.file;
  if (args.output) config.outputPath = args.output;
  if (args.configFile) config.configFile = args.configFile;

  if (!config.usageError) {
    if (mode === "repl" && args.file) {
      config.usageError = "REPL mode does not take a program file";
    } else if (mode === "run" && !args.file) {
      config.usageError = "No program file given (use -r for the REPL)";
    }
  }

  return config;
}
