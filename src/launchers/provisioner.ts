import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { ChildProcessHandle, type SupervisedProcess } from "../childProcessHandle.js";
import type { ChildProcessGateway } from "../gateways/childProcess.js";
import type { StructuredLogger } from "../logger.js";

/** Batch systems `vine_factory` can submit workers to. */
export const BATCH_TYPES = ["local", "condor", "uge", "slurm"] as const;
export type BatchType = (typeof BATCH_TYPES)[number];

export function isBatchType(value: string): value is BatchType {
  return BATCH_TYPES.some((type) => type === value);
}

export interface ProvisionerRequest {
  batchType: BatchType;
  managerName: string;
  minWorkers: number;
  maxWorkers: number;
  coresPerWorker: number;
  /** Environment archive shipped to every worker, if any. */
  envArchive: string | null;
  runDir: string;
}

export interface ProvisionerLaunchOptions {
  readonly executable?: string;
  readonly gateway?: ChildProcessGateway;
  readonly logger?: StructuredLogger;
}

/** Launches the provisioner for a run; the result is registered for cleanup by the caller. */
export type ProvisionerLauncher = (request: ProvisionerRequest) => Promise<SupervisedProcess>;

export const PROVISIONER_LABEL = "vine_factory";
export const PROVISIONER_LOG = "factory.log";

/** Builds the `vine_factory` command line for {@link request}. */
export function buildProvisionerArgs(request: ProvisionerRequest): string[] {
  const args = [
    `--batch-type=${request.batchType}`,
    `--manager-name=${request.managerName}`,
    `--min-workers=${request.minWorkers}`,
    `--max-workers=${request.maxWorkers}`,
    `--cores=${request.coresPerWorker}`,
    `--scratch-dir=${request.runDir}`,
  ];
  if (request.envArchive) {
    args.push(`--poncho-env=${request.envArchive}`);
  }
  return args;
}

export function createProvisionerLauncher(options: ProvisionerLaunchOptions = {}): ProvisionerLauncher {
  const executable = options.executable ?? "vine_factory";

  return (request) =>
    ChildProcessHandle.spawn({
      label: PROVISIONER_LABEL,
      command: executable,
      args: buildProvisionerArgs(request),
      cwd: request.runDir,
      logFile: path.join(request.runDir, PROVISIONER_LOG),
      ...(options.gateway ? { gateway: options.gateway } : {}),
      ...(options.logger ? { logger: options.logger } : {}),
    });
}
