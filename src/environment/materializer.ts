import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { MaterializationError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import { runCommand, type CommandResult, type CommandRunner } from "./command.js";

/** Suffixes recognised as ready-made environment archives. */
const ARCHIVE_SUFFIXES = [".tar.gz", ".tgz", ".tar"];

/** File name of the archive built inside the run directory. */
export const MATERIALIZED_ARCHIVE = "environment.tar.gz";

export interface MaterializeRequest {
  /** `environment.yml` (or compatible) description. */
  envFile: string;
  managerName: string;
  runDir: string;
}

/** Produces a portable environment archive and resolves with its absolute path. */
export type EnvironmentMaterializer = (request: MaterializeRequest) => Promise<string>;

export function isEnvironmentArchive(file: string): boolean {
  const lower = file.toLowerCase();
  return ARCHIVE_SUFFIXES.some((suffix) => lower.endsWith(suffix));
}

export interface PonchoMaterializerOptions {
  /** `poncho_package_create` executable. */
  readonly executable?: string;
  readonly runner?: CommandRunner;
  readonly logger?: StructuredLogger;
}

/**
 * Builds the archive with `poncho_package_create <envFile> <runDir>/environment.tar.gz`.
 */
export function createPonchoMaterializer(options: PonchoMaterializerOptions = {}): EnvironmentMaterializer {
  const executable = options.executable ?? "poncho_package_create";
  const runner = options.runner ?? runCommand;

  return async ({ envFile, managerName, runDir }) => {
    const source = path.resolve(envFile);
    const archive = path.join(runDir, MATERIALIZED_ARCHIVE);
    options.logger?.info("environment_materialize_started", { env_file: source, archive, manager_name: managerName });

    let result: CommandResult;
    try {
      result = await runner({ command: executable, args: [source, archive], cwd: runDir });
    } catch (error) {
      throw new MaterializationError(
        `${executable} could not start: ${describeError(error)}`,
        { envFile: source, executable },
        error,
      );
    }
    if (result.exitCode !== 0) {
      throw new MaterializationError(
        `${executable} exited with status ${result.exitCode ?? `signal ${result.signal ?? "unknown"}`}`,
        { envFile: source, executable, output: result.output },
      );
    }

    options.logger?.info("environment_materialized", { archive });
    return archive;
  };
}

/**
 * Returns the archive to stage for {@link envFile}: the file itself when it is
 * already an archive, a freshly materialised one otherwise.
 */
export async function resolveEnvironmentArchive(
  request: MaterializeRequest,
  materialize: EnvironmentMaterializer,
): Promise<string> {
  if (isEnvironmentArchive(request.envFile)) {
    return path.resolve(request.envFile);
  }
  return materialize(request);
}
