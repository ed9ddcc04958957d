import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { isLogLevel, type LogLevel } from "../logger.js";
import { readInt, readOptionalString, readString, type EnvSource } from "./env.js";

/** Supervision poll interval used when no override is configured. */
export const DEFAULT_POLL_INTERVAL_MS = 5_000;

/** Grace period between SIGTERM and SIGKILL (and after SIGKILL) during cleanup. */
export const DEFAULT_TERMINATE_GRACE_MS = 5_000;

/** Executables the runner shells out to. */
export interface ExecutableSettings {
  conda: string;
  vineFactory: string;
  jupyter: string;
  ponchoPackageCreate: string;
}

export interface RuntimeSettings {
  pollIntervalMs: number;
  terminateGraceMs: number;
  logLevel: LogLevel;
  logFile: string | null;
  executables: ExecutableSettings;
}

/**
 * Builds the runtime settings from `FLOABILITY_*` environment variables.
 */
export function loadRuntimeSettings(env: EnvSource = process.env): RuntimeSettings {
  const rawLevel = readString("FLOABILITY_LOG_LEVEL", "info", env).toLowerCase();

  return {
    pollIntervalMs: readInt("FLOABILITY_POLL_INTERVAL_MS", DEFAULT_POLL_INTERVAL_MS, { min: 1 }, env),
    terminateGraceMs: readInt("FLOABILITY_TERMINATE_GRACE_MS", DEFAULT_TERMINATE_GRACE_MS, { min: 0 }, env),
    logLevel: isLogLevel(rawLevel) ? rawLevel : "info",
    logFile: readOptionalString("FLOABILITY_LOG_FILE", env) ?? null,
    executables: {
      conda: readString("FLOABILITY_CONDA_BIN", "conda", env),
      vineFactory: readString("FLOABILITY_VINE_FACTORY_BIN", "vine_factory", env),
      jupyter: readString("FLOABILITY_JUPYTER_BIN", "jupyter", env),
      ponchoPackageCreate: readString("FLOABILITY_PONCHO_BIN", "poncho_package_create", env),
    },
  };
}
