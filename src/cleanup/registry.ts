import { rm } from "node:fs/promises";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { SupervisedProcess } from "../childProcessHandle.js";
import { DEFAULT_TERMINATE_GRACE_MS } from "../config/settings.js";
import { TerminationError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";

/** Obligation that could not be honoured during the cleanup pass. */
export type CleanupFailure =
  | { kind: "process"; label: string; pid: number | null; error: TerminationError }
  | { kind: "directory"; path: string; error: Error };

export interface CleanupReport {
  /** Labels of the processes handled, in registration order. */
  terminated: string[];
  /** Directories removed, in registration order. */
  removed: string[];
  failures: CleanupFailure[];
}

export type DirectoryRemover = (directory: string) => Promise<void>;

export interface CleanupRegistryOptions {
  readonly logger: StructuredLogger;
  /** Grace period handed to every {@link SupervisedProcess.terminate} call. */
  readonly terminateGraceMs?: number;
  /** Overrides the recursive removal (tests use it to observe ordering or inject failures). */
  readonly removeDirectory?: DirectoryRemover;
}

const removeRecursively: DirectoryRemover = (directory) => rm(directory, { recursive: true, force: true });

/**
 * Ledger of everything a run must release: processes to terminate and
 * directories to remove.
 *
 * The ledger is drained by a single pass. {@link cleanup} stores the pass
 * promise synchronously before its first suspension point, so every later
 * caller, a signal listener firing mid-pass included, receives the same
 * promise and no obligation is ever acted on twice. Processes are always
 * terminated before any directory is removed because a child may still read
 * from a staged directory. Directories are still removed when a child survived
 * its termination; `cleanup_directory_removed` is then logged as a warning
 * naming the survivors.
 */
export class CleanupRegistry {
  private readonly logger: StructuredLogger;
  private readonly terminateGraceMs: number;
  private readonly removeDirectory: DirectoryRemover;
  private readonly processes: SupervisedProcess[] = [];
  private readonly directories: string[] = [];
  private pass: Promise<CleanupReport> | null = null;

  constructor(options: CleanupRegistryOptions) {
    this.logger = options.logger;
    this.terminateGraceMs = options.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS;
    this.removeDirectory = options.removeDirectory ?? removeRecursively;
  }

  /** Whether the one-shot pass has been triggered. */
  get hasStarted(): boolean {
    return this.pass !== null;
  }

  get processCount(): number {
    return this.processes.length;
  }

  get directoryCount(): number {
    return this.directories.length;
  }

  registerProcess(handle: SupervisedProcess): void {
    if (this.pass) {
      // The pass already consumed the ledger; release the late arrival now.
      this.logger.warn("cleanup_late_registration", { kind: "process", label: handle.label, pid: handle.pid ?? null });
      handle.terminate({ graceMs: this.terminateGraceMs }).catch((error: unknown) => {
        this.logger.error("cleanup_process_failed", { label: handle.label, message: describeError(error) });
      });
      return;
    }
    this.processes.push(handle);
    this.logger.debug("cleanup_process_registered", { label: handle.label, pid: handle.pid ?? null });
  }

  registerDirectory(directory: string): void {
    if (this.pass) {
      this.logger.warn("cleanup_late_registration", { kind: "directory", path: directory });
      this.removeDirectory(directory).catch((error: unknown) => {
        this.logger.error("cleanup_directory_failed", { path: directory, message: describeError(error) });
      });
      return;
    }
    this.directories.push(directory);
    this.logger.debug("cleanup_directory_registered", { path: directory });
  }

  /**
   * Runs the cleanup pass once. Later calls return the first call's promise.
   * Never rejects: failures are reported in the {@link CleanupReport}.
   */
  cleanup(): Promise<CleanupReport> {
    if (this.pass) {
      this.logger.debug("cleanup_already_started");
      return this.pass;
    }
    // Assign before any pass code runs, so a re-entrant call made from inside
    // a terminate action still observes the flag.
    this.pass = Promise.resolve().then(() => this.runPass());
    return this.pass;
  }

  private async runPass(): Promise<CleanupReport> {
    const report: CleanupReport = { terminated: [], removed: [], failures: [] };
    this.logger.info("cleanup_started", {
      processes: this.processes.length,
      directories: this.directories.length,
    });

    // Labels of children that may still be running after their termination failed.
    const survivors: string[] = [];
    for (const handle of this.processes) {
      try {
        const outcome = await handle.terminate({ graceMs: this.terminateGraceMs });
        report.terminated.push(handle.label);
        this.logger.info("cleanup_process_terminated", {
          label: handle.label,
          pid: handle.pid ?? null,
          already_exited: outcome.alreadyExited,
          forced: outcome.forced,
        });
      } catch (error) {
        const failure =
          error instanceof TerminationError
            ? error
            : new TerminationError(
                `failed to terminate ${handle.label}: ${describeError(error)}`,
                { label: handle.label, pid: handle.pid ?? null },
                error,
              );
        survivors.push(handle.label);
        report.failures.push({ kind: "process", label: handle.label, pid: handle.pid ?? null, error: failure });
        this.logger.error("cleanup_process_failed", failure.toLogPayload());
      }
    }

    for (const directory of this.directories) {
      try {
        await this.removeDirectory(directory);
        report.removed.push(directory);
        if (survivors.length > 0) {
          this.logger.warn("cleanup_directory_removed", {
            path: directory,
            process_still_alive: true,
            survivors: [...survivors],
          });
        } else {
          this.logger.info("cleanup_directory_removed", { path: directory, process_still_alive: false });
        }
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        report.failures.push({ kind: "directory", path: directory, error: failure });
        this.logger.error("cleanup_directory_failed", { path: directory, message: failure.message });
      }
    }

    this.logger.info("cleanup_completed", {
      terminated: report.terminated.length,
      removed: report.removed.length,
      failures: report.failures.length,
    });
    return report;
  }
}
