import type { ChildProcess } from "node:child_process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { defaultChildProcessGateway, type ChildProcessGateway } from "../gateways/childProcess.js";

export interface CommandRequest {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd?: string;
  readonly envOverrides?: Readonly<Record<string, string | undefined>>;
}

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Interleaved stdout and stderr. */
  output: string;
}

/** Runs a command to completion. Rejects only when it cannot be started. */
export type CommandRunner = (request: CommandRequest) => Promise<CommandResult>;

/** Output beyond this many characters is truncated from the front. */
const MAX_CAPTURED_OUTPUT = 64 * 1024;

/**
 * Default {@link CommandRunner} backed by the child process gateway. Used for
 * the short-lived helper commands (conda-unpack, poncho_package_create) whose
 * diagnostics must reach the operator when they fail.
 */
export function createCommandRunner(gateway: ChildProcessGateway = defaultChildProcessGateway): CommandRunner {
  return (request: CommandRequest) =>
    new Promise<CommandResult>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = gateway.spawn({ ...request, stdio: ["ignore", "pipe", "pipe"] });
      } catch (error) {
        reject(error);
        return;
      }

      let output = "";
      const capture = (chunk: Buffer) => {
        output += chunk.toString("utf8");
        if (output.length > MAX_CAPTURED_OUTPUT) {
          output = output.slice(output.length - MAX_CAPTURED_OUTPUT);
        }
      };
      child.stdout?.on("data", capture);
      child.stderr?.on("data", capture);

      child.once("error", reject);
      child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
        resolve({ exitCode: code, signal, output });
      });
    });
}

export const runCommand: CommandRunner = createCommandRunner();
