import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { SafeArchiveExtractor } from "../archive/safeExtract.js";
import { ExtractionError, FixupError, PathTraversalError, StagingWriteError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import { runCommand, type CommandResult, type CommandRunner } from "./command.js";

/** Variable the TaskVine worker reads to find its manager. */
export const MANAGER_NAME_VARIABLE = "VINE_MANAGER_NAME";

/** Activation script sourced by `conda activate` / `conda run`, relative to the environment root. */
export const ACTIVATION_SCRIPT = path.join("etc", "conda", "activate.d", "env_vars.sh");

export interface StagedEnvironment {
  /** Root of the extracted environment. */
  envDir: string;
  /** Activation script that received the manager name. */
  activationScript: string;
  /** Output captured from the unpack fixup. */
  fixupOutput: string;
}

/**
 * Rewrites the absolute prefixes baked into a relocated environment. Resolves
 * with the command output on success.
 */
export type UnpackFixup = (envDir: string) => Promise<string>;

export interface CondaUnpackOptions {
  /** conda executable, `conda` by default. */
  readonly conda?: string;
  readonly runner?: CommandRunner;
}

/**
 * Default fixup: `conda run --prefix <envDir> --no-capture-output conda-unpack`.
 */
export function createCondaUnpackFixup(options: CondaUnpackOptions = {}): UnpackFixup {
  const conda = options.conda ?? "conda";
  const runner = options.runner ?? runCommand;

  return async (envDir: string): Promise<string> => {
    const args = ["run", "--prefix", envDir, "--no-capture-output", "conda-unpack"];
    let result: CommandResult;
    try {
      result = await runner({ command: conda, args, cwd: envDir });
    } catch (error) {
      throw new FixupError(`conda-unpack could not start: ${describeError(error)}`, "", null, error);
    }
    if (result.exitCode !== 0) {
      throw new FixupError(
        `conda-unpack exited with status ${result.exitCode ?? `signal ${result.signal ?? "unknown"}`}`,
        result.output,
        result.exitCode,
      );
    }
    return result.output;
  };
}

export interface EnvironmentStagerOptions {
  readonly logger: StructuredLogger;
  readonly extractor?: SafeArchiveExtractor;
  readonly fixup?: UnpackFixup;
}

/**
 * Turns a portable environment archive into a usable environment under the
 * run directory: extract, inject the manager name, fix up embedded paths.
 * Each step fails with its own error type; the caller owns cleanup.
 */
export class EnvironmentStager {
  private readonly logger: StructuredLogger;
  private readonly extractor: SafeArchiveExtractor;
  private readonly fixup: UnpackFixup;

  constructor(options: EnvironmentStagerOptions) {
    this.logger = options.logger;
    this.extractor = options.extractor ?? new SafeArchiveExtractor({ logger: options.logger });
    this.fixup = options.fixup ?? createCondaUnpackFixup();
  }

  async stage(archivePath: string, destDir: string, managerName: string): Promise<StagedEnvironment> {
    try {
      await this.extractor.extract(archivePath, destDir);
    } catch (error) {
      if (error instanceof ExtractionError || error instanceof PathTraversalError) {
        throw error;
      }
      throw new ExtractionError(`failed to extract ${archivePath}: ${describeError(error)}`, { archivePath }, error);
    }

    const activationScript = path.join(destDir, ACTIVATION_SCRIPT);
    try {
      await mkdir(path.dirname(activationScript), { recursive: true });
      await appendFile(activationScript, `\nexport ${MANAGER_NAME_VARIABLE}=${managerName}\n`, "utf8");
    } catch (error) {
      throw new StagingWriteError(
        `cannot update ${activationScript}: ${describeError(error)}`,
        { activationScript },
        error,
      );
    }
    this.logger.info("environment_manager_name_set", {
      variable: MANAGER_NAME_VARIABLE,
      manager_name: managerName,
      activation_script: activationScript,
    });

    const fixupOutput = await this.fixup(destDir).catch((error: unknown) => {
      if (error instanceof FixupError) {
        throw error;
      }
      throw new FixupError(`unpack fixup failed: ${describeError(error)}`, "", null, error);
    });
    this.logger.info("environment_staged", { env_dir: destDir });

    return { envDir: destDir, activationScript, fixupOutput };
  }
}
