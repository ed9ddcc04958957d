import { randomUUID } from "node:crypto";
import { mkdir } from "node:fs/promises";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { z } from "zod";

import type { SupervisedProcess } from "./childProcessHandle.js";
import { CleanupRegistry, type CleanupReport, type DirectoryRemover } from "./cleanup/registry.js";
import { SignalBridge, type ExitFunction, type SignalTarget } from "./cleanup/signals.js";
import { loadRuntimeSettings, type RuntimeSettings } from "./config/settings.js";
import { ensureDataIsFetched, type DataFetcher } from "./data/fetcher.js";
import { createPonchoMaterializer, resolveEnvironmentArchive, type EnvironmentMaterializer } from "./environment/materializer.js";
import { createCondaUnpackFixup, EnvironmentStager } from "./environment/stager.js";
import { FloabilityError, InvalidOptionsError, RunAbortedError, type RunPhase } from "./errors.js";
import { BATCH_TYPES, createProvisionerLauncher, type ProvisionerLauncher } from "./launchers/provisioner.js";
import { createSessionLauncher, type SessionLauncher } from "./launchers/session.js";
import { StructuredLogger } from "./logger.js";
import { describeError } from "./nodePrimitives.js";
import { allocateRunDirectory } from "./paths.js";
import { SupervisionLoop, type SupervisionOutcome, type SupervisionState } from "./supervision/loop.js";

/** Prefix of every run directory created under the base directory. */
export const RUN_DIRECTORY_PREFIX = "floability_run";

/** Name of the staged environment inside the run directory. */
export const STAGED_ENV_DIRECTORY = "current_conda_env";

/** Token shape accepted for manager names: it is written unquoted into a shell script. */
const MANAGER_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

export const RunOptionsSchema = z
  .object({
    environment: z.string().trim().min(1).nullable().default(null),
    notebook: z.string().trim().min(1).nullable().default(null),
    batchType: z.enum(BATCH_TYPES).default("local"),
    workers: z.number().int().positive().default(5),
    coresPerWorker: z.number().int().positive().default(1),
    managerName: z
      .string()
      .regex(MANAGER_NAME_PATTERN, "manager name may only contain letters, digits, '.', '_' and '-'")
      .nullable()
      .default(null),
    jupyterPort: z.number().int().min(1).max(65_535).default(8888),
    baseDir: z.string().trim().min(1).default("/tmp"),
    dataSpec: z.string().trim().min(1).nullable().default(null),
    backpackRoot: z.string().trim().min(1).default("."),
  })
  .strict();

/** Options accepted by {@link run}, before defaults are applied. */
export type RunOptionsInput = z.input<typeof RunOptionsSchema>;
export type RunOptions = z.output<typeof RunOptionsSchema>;

/**
 * Collaborators of a run. Every entry defaults to the production
 * implementation; tests replace the external ones with in-process fakes.
 */
export interface RunDependencies {
  logger?: StructuredLogger;
  settings?: RuntimeSettings;
  fetchData?: DataFetcher;
  materialize?: EnvironmentMaterializer;
  stager?: EnvironmentStager;
  launchProvisioner?: ProvisionerLauncher;
  launchSession?: SessionLauncher;
  /** Emitter receiving SIGINT/SIGTERM, `process` by default. */
  signalTarget?: SignalTarget;
  exit?: ExitFunction;
  removeDirectory?: DirectoryRemover;
  /** Aborting interrupts supervision (the programmatic Ctrl-C). */
  signal?: AbortSignal;
  onStateChange?: (state: SupervisionState) => void;
}

export interface RunResult {
  runDir: string;
  managerName: string;
  stagedEnvDir: string | null;
  outcome: SupervisionOutcome;
  cleanup: CleanupReport;
}

/** Generates the default manager identity, `floability-<uuid>`. */
export function generateManagerName(): string {
  return `floability-${randomUUID()}`;
}

export function parseRunOptions(input: RunOptionsInput): RunOptions {
  const parsed = RunOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`);
    throw new InvalidOptionsError(`invalid run options: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

/**
 * Runs one supervised session: allocate the run directory, fetch data, stage
 * the environment, start the provisioner and the interactive session, and
 * supervise them until the provisioner ends or the run is interrupted.
 *
 * Everything created along the way is registered with one
 * {@link CleanupRegistry}, released exactly once by whichever comes first:
 * the end of supervision, an aborted phase, or SIGINT/SIGTERM.
 *
 * @throws {RunAbortedError} When a phase fails before supervision starts; cleanup has already run.
 */
export async function run(input: RunOptionsInput, dependencies: RunDependencies = {}): Promise<RunResult> {
  const settings = dependencies.settings ?? loadRuntimeSettings();
  const logger =
    dependencies.logger ?? new StructuredLogger({ logFile: settings.logFile, minLevel: settings.logLevel });

  let options: RunOptions;
  try {
    options = parseRunOptions(input);
  } catch (error) {
    throw abort(logger, "options", error);
  }

  const registry = new CleanupRegistry({
    logger,
    terminateGraceMs: settings.terminateGraceMs,
    ...(dependencies.removeDirectory ? { removeDirectory: dependencies.removeDirectory } : {}),
  });
  const bridge = new SignalBridge({
    registry,
    logger,
    ...(dependencies.signalTarget ? { target: dependencies.signalTarget } : {}),
    ...(dependencies.exit ? { exit: dependencies.exit } : {}),
  });
  bridge.install();

  try {
    return await supervise(options, settings, logger, registry, dependencies);
  } finally {
    bridge.uninstall();
  }
}

async function supervise(
  options: RunOptions,
  settings: RuntimeSettings,
  logger: StructuredLogger,
  registry: CleanupRegistry,
  dependencies: RunDependencies,
): Promise<RunResult> {
  /** Releases what was registered so far and builds the error for {@link phase}. */
  const failWith = async (phase: RunPhase, error: unknown): Promise<RunAbortedError> => {
    const aborted = abort(logger, phase, error);
    await registry.cleanup();
    return aborted;
  };

  let runDir: string;
  try {
    runDir = await allocateRunDirectory(options.baseDir, RUN_DIRECTORY_PREFIX);
  } catch (error) {
    throw await failWith("allocate", error);
  }
  logger.info("run_directory_allocated", { run_dir: runDir });

  if (options.dataSpec) {
    const fetchData: DataFetcher =
      dependencies.fetchData ?? ((specPath, root) => ensureDataIsFetched(specPath, root, { logger }));
    try {
      await fetchData(options.dataSpec, options.backpackRoot);
    } catch (error) {
      throw await failWith("fetch", error);
    }
  }

  const managerName = options.managerName ?? generateManagerName();
  logger.info("manager_name", { manager_name: managerName });

  let envArchive: string | null = null;
  let stagedEnvDir: string | null = null;
  if (options.environment) {
    const materialize =
      dependencies.materialize ??
      createPonchoMaterializer({ executable: settings.executables.ponchoPackageCreate, logger });
    try {
      envArchive = await resolveEnvironmentArchive(
        { envFile: options.environment, managerName, runDir },
        materialize,
      );
    } catch (error) {
      throw await failWith("materialize", error);
    }

    const envDir = path.join(runDir, STAGED_ENV_DIRECTORY);
    const stager =
      dependencies.stager ??
      new EnvironmentStager({ logger, fixup: createCondaUnpackFixup({ conda: settings.executables.conda }) });
    try {
      await mkdir(envDir, { recursive: true });
      // Registered before extraction so a failed or interrupted staging never leaks it.
      registry.registerDirectory(envDir);
      await stager.stage(envArchive, envDir, managerName);
    } catch (error) {
      throw await failWith("stage", error);
    }
    stagedEnvDir = envDir;
  } else {
    logger.info("environment_skipped");
  }

  const launchProvisioner =
    dependencies.launchProvisioner ??
    createProvisionerLauncher({ executable: settings.executables.vineFactory, logger });
  const launchSession =
    dependencies.launchSession ??
    createSessionLauncher({ jupyter: settings.executables.jupyter, conda: settings.executables.conda, logger });

  let provisioner: SupervisedProcess;
  let session: SupervisedProcess;
  try {
    provisioner = await launchProvisioner({
      batchType: options.batchType,
      managerName,
      minWorkers: 1,
      maxWorkers: options.workers,
      coresPerWorker: options.coresPerWorker,
      envArchive,
      runDir,
    });
    registry.registerProcess(provisioner);

    session = await launchSession({
      notebookPath: options.notebook,
      port: options.jupyterPort,
      runDir,
      stagedEnvDir,
    });
    registry.registerProcess(session);
  } catch (error) {
    throw await failWith("spawn", error);
  }

  const loop = new SupervisionLoop({
    provisioner,
    session,
    registry,
    logger,
    pollIntervalMs: settings.pollIntervalMs,
    ...(dependencies.signal ? { signal: dependencies.signal } : {}),
    ...(dependencies.onStateChange ? { onStateChange: dependencies.onStateChange } : {}),
  });
  const outcome = await loop.run();
  logger.info("run_finished", { run_dir: runDir, reason: outcome.reason });

  return { runDir, managerName, stagedEnvDir, outcome, cleanup: outcome.cleanup };
}

function abort(logger: StructuredLogger, phase: RunPhase, error: unknown): RunAbortedError {
  const aborted = new RunAbortedError(phase, error);
  logger.error("run_aborted", {
    phase,
    ...(error instanceof FloabilityError ? error.toLogPayload() : { message: describeError(error) }),
  });
  return aborted;
}
