#!/usr/bin/env node
import process from "node:process";
import { pathToFileURL } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { loadRuntimeSettings } from "./config/settings.js";
import { ensureDataIsFetched, type DataFetcher } from "./data/fetcher.js";
import { FloabilityError, InvalidOptionsError, RunAbortedError } from "./errors.js";
import { BATCH_TYPES, isBatchType } from "./launchers/provisioner.js";
import { StructuredLogger } from "./logger.js";
import { describeError } from "./nodePrimitives.js";
import { run, type RunDependencies, type RunOptionsInput } from "./run.js";

export const USAGE = `Usage: floability <command> [flags]

Commands:
  run      Run a notebook with provisioned workers
  fetch    Fetch the data declared in a data spec
  pack     Package a notebook into a backpack (not implemented yet)
  verify   Verify a backpack (not implemented yet)

run flags:
  --environment <file>       environment.yml or environment archive
  --notebook <file>          notebook opened in JupyterLab
  --batch-type <type>        local | condor | uge | slurm (default local)
  --workers <n>              maximum number of workers (default 5)
  --cores-per-worker <n>     cores requested per worker (default 1)
  --manager-name <name>      manager name (default floability-<uuid>)
  --jupyter-port <port>      JupyterLab port (default 8888)
  --base-dir <dir>           where the run directory is created (default /tmp)
  --data-spec <file>         data.yml fetched before the run
  --backpack-root <dir>      root of the backpack (default .)

fetch flags:
  --data-spec <file>         data.yml to fetch (required)
  --backpack-root <dir>      root of the backpack (default .)
`;

export type CliCommand =
  | { kind: "run"; options: RunOptionsInput }
  | { kind: "fetch"; dataSpec: string; backpackRoot: string }
  | { kind: "pack" }
  | { kind: "verify" }
  | { kind: "help" };

const RUN_FLAGS = new Set([
  "--environment",
  "--notebook",
  "--batch-type",
  "--workers",
  "--cores-per-worker",
  "--manager-name",
  "--jupyter-port",
  "--base-dir",
  "--data-spec",
  "--backpack-root",
]);

const FETCH_FLAGS = new Set(["--data-spec", "--backpack-root"]);

function parsePositiveInteger(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || !Number.isInteger(num) || num <= 0) {
    throw new InvalidOptionsError(`value ${value} for ${flag} must be a positive integer`, { flag, value });
  }
  return num;
}

/** Splits `--flag=value` / `--flag value` pairs, rejecting unknown flags. */
function readFlags(argv: readonly string[], allowed: ReadonlySet<string>): Map<string, string> {
  const flags = new Map<string, string>();
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg.startsWith("--")) {
      throw new InvalidOptionsError(`unexpected argument ${arg}`, { argument: arg });
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    if (!allowed.has(flag)) {
      throw new InvalidOptionsError(`unknown flag ${flag}`, { flag });
    }

    let value = separator === -1 ? undefined : arg.slice(separator + 1);
    if (value === undefined || value === "") {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new InvalidOptionsError(`flag ${flag} requires a value`, { flag });
      }
      value = next;
      index += 1;
    }
    flags.set(flag, value);
  }
  return flags;
}

/**
 * Parses `process.argv.slice(2)` into a command. Defaults are left to the run
 * options schema so the CLI and programmatic callers share them.
 */
export function parseCliArguments(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;
  switch (command) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { kind: "help" };
    case "pack":
      return { kind: "pack" };
    case "verify":
      return { kind: "verify" };
    case "fetch": {
      const flags = readFlags(rest, FETCH_FLAGS);
      const dataSpec = flags.get("--data-spec");
      if (!dataSpec) {
        throw new InvalidOptionsError("fetch requires --data-spec", { flag: "--data-spec" });
      }
      return { kind: "fetch", dataSpec, backpackRoot: flags.get("--backpack-root") ?? "." };
    }
    case "run": {
      const flags = readFlags(rest, RUN_FLAGS);
      const options: RunOptionsInput = {};
      for (const [flag, value] of flags) {
        switch (flag) {
          case "--environment":
            options.environment = value;
            break;
          case "--notebook":
            options.notebook = value;
            break;
          case "--batch-type":
            if (!isBatchType(value)) {
              throw new InvalidOptionsError(`--batch-type must be one of ${BATCH_TYPES.join(", ")}`, {
                flag,
                value,
              });
            }
            options.batchType = value;
            break;
          case "--workers":
            options.workers = parsePositiveInteger(value, flag);
            break;
          case "--cores-per-worker":
            options.coresPerWorker = parsePositiveInteger(value, flag);
            break;
          case "--manager-name":
            options.managerName = value;
            break;
          case "--jupyter-port":
            options.jupyterPort = parsePositiveInteger(value, flag);
            break;
          case "--base-dir":
            options.baseDir = value;
            break;
          case "--data-spec":
            options.dataSpec = value;
            break;
          case "--backpack-root":
            options.backpackRoot = value;
            break;
        }
      }
      return { kind: "run", options };
    }
    default:
      throw new InvalidOptionsError(`unknown command ${command}`, { command });
  }
}

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Executes the CLI and resolves with the exit status: 0 after a normal
 * supervised shutdown, 1 when a phase failed. Signal-driven shutdowns exit
 * from the signal bridge directly.
 */
export async function main(
  argv: readonly string[],
  io: CliIo = processIo,
  dependencies: RunDependencies = {},
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArguments(argv);
  } catch (error) {
    io.stderr(`floability: ${describeError(error)}\n\n${USAGE}`);
    return 1;
  }

  const settings = dependencies.settings ?? loadRuntimeSettings();
  const logger =
    dependencies.logger ?? new StructuredLogger({ logFile: settings.logFile, minLevel: settings.logLevel });

  try {
    switch (command.kind) {
      case "help":
        io.stdout(USAGE);
        return 0;
      case "pack":
      case "verify":
        io.stdout(`floability: '${command.kind}' is not implemented yet.\n`);
        return 0;
      case "fetch": {
        const fetchData: DataFetcher =
          dependencies.fetchData ?? ((spec, root) => ensureDataIsFetched(spec, root, { logger }));
        await fetchData(command.dataSpec, command.backpackRoot);
        return 0;
      }
      case "run":
        await run(command.options, { ...dependencies, settings, logger });
        return 0;
    }
  } catch (error) {
    io.stderr(`floability: ${formatFailure(error)}\n`);
    return 1;
  } finally {
    await logger.flush();
  }
}

/** One-line summary naming the failed phase and the underlying cause. */
export function formatFailure(error: unknown): string {
  if (error instanceof RunAbortedError) {
    const cause = error.cause;
    const hint = cause instanceof FloabilityError ? ` (${cause.code}: ${cause.hint})` : "";
    return `${error.phase} failed: ${describeError(cause)}${hint}`;
  }
  if (error instanceof FloabilityError) {
    return `${error.message} (${error.code}: ${error.hint})`;
  }
  return describeError(error);
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`floability: ${describeError(error)}\n`);
      process.exitCode = 1;
    },
  );
}
