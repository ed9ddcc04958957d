/**
 * Gateway responsible for spawning the external processes of a run
 * (provisioner, interactive session, fixup and packaging commands). It
 * validates the command line, builds the child environment from the parent's
 * plus explicit overrides, and never goes through a shell.
 */
import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from "node:child_process";

import type { ProcessEnv } from "../nodePrimitives.js";

// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

export interface SpawnChildProcessOptions {
  /** Executable name or absolute path. Must not be empty. */
  readonly command: string;
  /** Ordered list of arguments forwarded as-is to {@link nodeSpawn}. */
  readonly args?: readonly string[];
  readonly cwd?: string;
  /** Environment inherited by the child (defaults to {@link process.env}). */
  readonly inheritEnv?: ProcessEnv;
  /**
   * Overrides applied on top of {@link inheritEnv}. An `undefined` value
   * removes the variable from the child environment.
   */
  readonly envOverrides?: Readonly<Record<string, string | undefined>>;
  /** Spawn stdio configuration (defaults to `pipe`). */
  readonly stdio?: SpawnOptions["stdio"];
}

export class InvalidChildProcessCommandError extends Error {
  constructor(command: string) {
    super(`Child process command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidChildProcessCommandError";
  }
}

export class InvalidChildProcessArgumentError extends TypeError {
  constructor(value: unknown, index: number) {
    super(`Child process arguments must be strings without NUL bytes. Argument at index ${index} is invalid (${typeof value}).`);
    this.name = "InvalidChildProcessArgumentError";
  }
}

/**
 * Contract exposed by the child process gateway. Tests inject their own
 * implementation to observe launches without starting real commands.
 */
export interface ChildProcessGateway {
  spawn(options: SpawnChildProcessOptions): ChildProcess;
}

interface ChildProcessGatewayDeps {
  /** Concrete spawn implementation (defaults to Node.js {@link nodeSpawn}). */
  readonly spawnImpl?: typeof nodeSpawn;
}

export function createChildProcessGateway({
  spawnImpl = nodeSpawn,
}: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    spawn(options: SpawnChildProcessOptions): ChildProcess {
      const command = options.command;
      if (typeof command !== "string" || command.trim().length === 0) {
        throw new InvalidChildProcessCommandError(command);
      }

      const spawnOptions: SpawnOptions = {
        env: buildEnvironment(options.inheritEnv ?? process.env, options.envOverrides ?? {}),
        stdio: options.stdio ?? "pipe",
        shell: false,
        windowsVerbatimArguments: false,
      };
      if (options.cwd !== undefined) {
        spawnOptions.cwd = options.cwd;
      }

      return spawnImpl(command, normaliseArgs(options.args), spawnOptions);
    },
  };
}

/** Shared gateway used when callers do not inject one. */
export const defaultChildProcessGateway: ChildProcessGateway = createChildProcessGateway();

/**
 * Ensures the argument list exclusively contains strings and returns a copy so
 * later mutations by the caller do not leak into the spawned command line.
 */
function normaliseArgs(args: SpawnChildProcessOptions["args"]): string[] {
  if (args === undefined) {
    return [];
  }

  return args.map((value, index) => {
    if (typeof value !== "string" || value.includes("\u0000")) {
      throw new InvalidChildProcessArgumentError(value, index);
    }
    return value;
  });
}

function buildEnvironment(
  inheritEnv: ProcessEnv,
  overrides: Readonly<Record<string, string | undefined>>,
): ProcessEnv {
  const env: ProcessEnv = { ...inheritEnv };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      delete env[key];
    } else {
      env[key] = value;
    }
  }
  return env;
}
