import process from "node:process";
import { constants } from "node:os";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Environment snapshot handed to spawned children. */
export type ProcessEnv = typeof process.env;

/** Signals the runner sends to children or listens for on itself. */
export type SignalName = "SIGINT" | "SIGTERM" | "SIGKILL" | "SIGHUP" | "SIGQUIT";

/**
 * Lightweight representation of an errno-flavoured error. Only the properties
 * we actually inspect are included.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/**
 * Narrows an unknown rejection to an errno error, optionally matching one of
 * the provided codes (`ENOENT`, `EEXIST`, ...).
 */
export function isErrnoException(error: unknown, ...codes: string[]): error is ErrnoException {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  const code = error.code;
  if (typeof code !== "string") {
    return false;
  }
  return codes.length === 0 || codes.includes(code);
}

/** Conventional `128 + signo` exit status reported after a fatal signal. */
export function signalExitCode(signal: SignalName): number {
  return 128 + constants.signals[signal];
}

/** Renders an unknown failure as a message suitable for structured logs. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
