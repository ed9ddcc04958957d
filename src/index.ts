export { SafeArchiveExtractor, detectArchiveEncoding, type ArchiveEncoding } from "./archive/safeExtract.js";
export {
  ChildProcessHandle,
  type ChildExit,
  type SpawnProcessOptions,
  type SupervisedProcess,
  type TerminateOptions,
  type TerminationOutcome,
} from "./childProcessHandle.js";
export { CleanupRegistry, type CleanupFailure, type CleanupReport } from "./cleanup/registry.js";
export { SignalBridge, type SignalTarget } from "./cleanup/signals.js";
export { loadRuntimeSettings, type RuntimeSettings } from "./config/settings.js";
export { ensureDataIsFetched, parseDataSpec, type DataFetchResult, type DataSpec } from "./data/fetcher.js";
export {
  createPonchoMaterializer,
  resolveEnvironmentArchive,
  type EnvironmentMaterializer,
} from "./environment/materializer.js";
export {
  ACTIVATION_SCRIPT,
  MANAGER_NAME_VARIABLE,
  EnvironmentStager,
  createCondaUnpackFixup,
  type StagedEnvironment,
  type UnpackFixup,
} from "./environment/stager.js";
export * from "./errors.js";
export { BATCH_TYPES, buildProvisionerArgs, createProvisionerLauncher, type BatchType } from "./launchers/provisioner.js";
export { buildSessionCommand, createSessionLauncher } from "./launchers/session.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { allocateRunDirectory, canonicalizePath, resolveWithin } from "./paths.js";
export {
  RUN_DIRECTORY_PREFIX,
  STAGED_ENV_DIRECTORY,
  generateManagerName,
  parseRunOptions,
  run,
  type RunDependencies,
  type RunOptions,
  type RunOptionsInput,
  type RunResult,
} from "./run.js";
export { SupervisionLoop, type SupervisionOutcome, type SupervisionState } from "./supervision/loop.js";
