import type { ChildProcess } from "node:child_process";
import { createWriteStream } from "node:fs";
import type { Writable } from "node:stream";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { DEFAULT_TERMINATE_GRACE_MS } from "./config/settings.js";
import { SpawnError, TerminationError } from "./errors.js";
import {
  defaultChildProcessGateway,
  type ChildProcessGateway,
  type SpawnChildProcessOptions,
} from "./gateways/childProcess.js";
import type { StructuredLogger } from "./logger.js";
import { describeError, type SignalName } from "./nodePrimitives.js";
import { settlesWithin } from "./runtime/timers.js";

/** Stops feeding {@link logStream} and keeps the child's pipes flowing so it never blocks on a full pipe. */
function detachLog(child: ChildProcess, logStream: Writable): void {
  for (const output of [child.stdout, child.stderr]) {
    output?.unpipe(logStream);
    output?.resume();
  }
}

/**
 * Uniform view over a process the cleanup registry and the supervision loop
 * can act on. {@link ChildProcessHandle} is the production implementation;
 * tests substitute in-process doubles.
 */
export interface SupervisedProcess {
  /** Human readable name used in logs (`vine_factory`, `jupyterlab`, ...). */
  readonly label: string;
  readonly pid: number | undefined;
  /** Non-blocking liveness probe. */
  isAlive(): boolean;
  /** Graceful then forced termination; a no-op once the process is gone. */
  terminate(options?: TerminateOptions): Promise<TerminationOutcome>;
}

export interface TerminateOptions {
  /** Delay granted after SIGTERM (and again after SIGKILL). */
  readonly graceMs?: number;
}

export interface TerminationOutcome {
  /** The process had already exited before termination was requested. */
  alreadyExited: boolean;
  /** SIGKILL had to be sent. */
  forced: boolean;
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ChildExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface SpawnProcessOptions extends SpawnChildProcessOptions {
  readonly label: string;
  /** File receiving the child's stdout and stderr (appended). */
  readonly logFile?: string;
  readonly gateway?: ChildProcessGateway;
  readonly logger?: StructuredLogger;
}

/**
 * Wraps one spawned external process. Exit is tracked from the `exit` event so
 * {@link isAlive} only reads local state.
 */
export class ChildProcessHandle implements SupervisedProcess {
  public readonly label: string;
  private readonly child: ChildProcess;
  private readonly logger: StructuredLogger | undefined;
  private readonly exitPromise: Promise<ChildExit>;
  private exit: ChildExit | null = null;
  private termination: Promise<TerminationOutcome> | null = null;

  private constructor(label: string, child: ChildProcess, logger?: StructuredLogger) {
    this.label = label;
    this.child = child;
    this.logger = logger;
    this.exitPromise = new Promise<ChildExit>((resolve) => {
      child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
        this.exit = { code, signal };
        this.logger?.info("child_exited", { label: this.label, pid: this.pid, code, signal });
        resolve(this.exit);
      });
    });
    if (child.exitCode !== null || child.signalCode !== null) {
      this.exit = { code: child.exitCode, signal: child.signalCode };
    }
  }

  /**
   * Starts the process and resolves once the OS reports it running.
   *
   * @throws {SpawnError} When the command is invalid or the executable cannot be started.
   */
  static async spawn(options: SpawnProcessOptions): Promise<ChildProcessHandle> {
    const gateway = options.gateway ?? defaultChildProcessGateway;
    const logStream = options.logFile ? createWriteStream(options.logFile, { flags: "a" }) : null;
    const stdio = logStream ? (["ignore", "pipe", "pipe"] as const) : (["ignore", "ignore", "ignore"] as const);

    let child: ChildProcess;
    let attached: ChildProcess | null = null;
    let logFailed = false;
    // A log file that cannot be opened or written must not take the runner
    // down: the child keeps running and its output is drained instead.
    logStream?.on("error", (error: Error) => {
      if (logFailed) {
        return;
      }
      logFailed = true;
      options.logger?.warn("child_log_failed", {
        label: options.label,
        log_file: options.logFile ?? null,
        message: error.message,
      });
      if (attached) {
        detachLog(attached, logStream);
      }
    });

    try {
      const started = gateway.spawn({ ...options, stdio: options.stdio ?? [...stdio] });
      child = started;
      attached = started;
      await new Promise<void>((resolve, reject) => {
        const onSpawn = () => {
          started.off("error", onError);
          resolve();
        };
        const onError = (error: Error) => {
          started.off("spawn", onSpawn);
          reject(error);
        };
        started.once("spawn", onSpawn);
        started.once("error", onError);
      });
    } catch (error) {
      logStream?.end();
      throw new SpawnError(
        `failed to start ${options.label} (${options.command}): ${describeError(error)}`,
        { label: options.label, command: options.command, args: [...(options.args ?? [])] },
        error,
      );
    }

    if (logStream) {
      if (logFailed) {
        detachLog(child, logStream);
      } else {
        child.stdout?.pipe(logStream, { end: false });
        child.stderr?.pipe(logStream, { end: false });
      }
      child.once("close", () => {
        if (!logStream.destroyed) {
          logStream.end();
        }
      });
    }
    // Late errors (for instance a failed kill) must not crash the runner.
    child.on("error", (error: Error) => {
      options.logger?.warn("child_error", { label: options.label, message: error.message });
    });

    const handle = new ChildProcessHandle(options.label, child, options.logger);
    options.logger?.info("child_spawned", {
      label: options.label,
      pid: child.pid ?? null,
      command: options.command,
      args: [...(options.args ?? [])],
      log_file: options.logFile ?? null,
    });
    return handle;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  /** Exit status once the process is gone, `null` while it runs. */
  get exitStatus(): ChildExit | null {
    return this.exit;
  }

  isAlive(): boolean {
    return this.exit === null;
  }

  /** Resolves when the child exits. */
  waitForExit(): Promise<ChildExit> {
    return this.exitPromise;
  }

  /**
   * Sends SIGTERM, escalates to SIGKILL after {@link TerminateOptions.graceMs}.
   * Concurrent and repeated calls share the same termination.
   *
   * @throws {TerminationError} When the child survives SIGKILL for another grace period.
   */
  terminate(options: TerminateOptions = {}): Promise<TerminationOutcome> {
    if (this.termination) {
      return this.termination;
    }
    if (this.exit) {
      return Promise.resolve({ alreadyExited: true, forced: false, ...this.exit });
    }
    this.termination = this.performTermination(options.graceMs ?? DEFAULT_TERMINATE_GRACE_MS);
    return this.termination;
  }

  private async performTermination(graceMs: number): Promise<TerminationOutcome> {
    this.signal("SIGTERM");
    if (await settlesWithin(this.exitPromise, graceMs)) {
      const exit = await this.exitPromise;
      return { alreadyExited: false, forced: false, ...exit };
    }

    this.logger?.warn("child_kill_escalated", { label: this.label, pid: this.pid, grace_ms: graceMs });
    this.signal("SIGKILL");
    if (await settlesWithin(this.exitPromise, graceMs)) {
      const exit = await this.exitPromise;
      return { alreadyExited: false, forced: true, ...exit };
    }

    throw new TerminationError(`${this.label} (pid ${this.pid ?? "unknown"}) survived SIGKILL`, {
      label: this.label,
      pid: this.pid ?? null,
    });
  }

  private signal(signal: SignalName): void {
    if (this.exit) {
      return;
    }
    try {
      this.child.kill(signal);
    } catch (error) {
      this.logger?.warn("child_signal_failed", { label: this.label, signal, message: describeError(error) });
    }
  }
}
