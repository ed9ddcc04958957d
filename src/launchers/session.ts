import path from "node:path";
import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { ChildProcessHandle, type SupervisedProcess } from "../childProcessHandle.js";
import type { ChildProcessGateway } from "../gateways/childProcess.js";
import type { StructuredLogger } from "../logger.js";

export interface SessionRequest {
  /** Notebook opened on start; JupyterLab starts on its file browser otherwise. */
  notebookPath: string | null;
  port: number;
  runDir: string;
  /** Staged environment JupyterLab runs inside, if any. */
  stagedEnvDir: string | null;
}

export interface SessionLaunchOptions {
  readonly jupyter?: string;
  readonly conda?: string;
  /** Directory served by JupyterLab, the current directory by default. */
  readonly rootDir?: string;
  readonly gateway?: ChildProcessGateway;
  readonly logger?: StructuredLogger;
}

export type SessionLauncher = (request: SessionRequest) => Promise<SupervisedProcess>;

export const SESSION_LABEL = "jupyterlab";
export const SESSION_LOG = "jupyter.log";

export interface SessionCommand {
  command: string;
  args: string[];
}

/**
 * Builds the JupyterLab command line. With a staged environment the server is
 * started through `conda run` so the environment's activation scripts (and the
 * manager name they export) apply to the kernels.
 */
export function buildSessionCommand(
  request: SessionRequest,
  executables: { jupyter: string; conda: string },
  rootDir: string,
): SessionCommand {
  const labArgs = ["lab", "--no-browser", `--port=${request.port}`, `--ServerApp.root_dir=${rootDir}`];
  if (request.notebookPath) {
    labArgs.push(request.notebookPath);
  }

  if (request.stagedEnvDir) {
    return {
      command: executables.conda,
      args: ["run", "--prefix", request.stagedEnvDir, "--no-capture-output", executables.jupyter, ...labArgs],
    };
  }
  return { command: executables.jupyter, args: labArgs };
}

export function createSessionLauncher(options: SessionLaunchOptions = {}): SessionLauncher {
  const executables = { jupyter: options.jupyter ?? "jupyter", conda: options.conda ?? "conda" };

  return (request) => {
    const rootDir = path.resolve(options.rootDir ?? process.cwd());
    const { command, args } = buildSessionCommand(request, executables, rootDir);
    return ChildProcessHandle.spawn({
      label: SESSION_LABEL,
      command,
      args,
      cwd: rootDir,
      logFile: path.join(request.runDir, SESSION_LOG),
      ...(options.gateway ? { gateway: options.gateway } : {}),
      ...(options.logger ? { logger: options.logger } : {}),
    });
  };
}
