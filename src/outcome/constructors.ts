import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";
import { errorDiag } from "./diagnostic";
import {
  LoopResolutionError,
  OutputError,
  SourceLoadError,
  TapewormError,
  ToolchainError,
  describeError,
} from "../core/errors";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

function reasonFor(e: TapewormError): FailureReason {
  if (e instanceof LoopResolutionError) return "unbalanced-brackets";
  if (e instanceof SourceLoadError) return "source-unreadable";
  if (e instanceof OutputError) return "output-unwritable";
  if (e instanceof ToolchainError) return "toolchain-failed";
  return "internal-error";
}

/**
 * Convert anything thrown by the engine into a Failure.
 * Bracket errors are recoverable (a REPL turn can be retried); the rest are not.
 */
export function failureFromError(e: unknown): Failure {
  if (e instanceof TapewormError) {
    const context: Record<string, unknown> = { code: e.code };
    if (e instanceof ToolchainError) {
      context.exitCode = e.exitCode;
      if (e.signal) context.signal = e.signal;
      context.stderr = e.stderr;
    }
    return failure(reasonFor(e), e.message, {
      diagnostics: [e.diagnostic],
      recoverable: e instanceof LoopResolutionError,
      context,
    });
  }
  const message = describeError(e);
  return failure("internal-error", message, {
    diagnostics: [errorDiag("E0200", message)],
  });
}

export function failFromError(e: unknown, meta: OutcomeMeta = {}): Fail {
  return fail(failureFromError(e), meta);
}
