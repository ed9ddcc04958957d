import type { SupervisedProcess } from "../childProcessHandle.js";
import type { CleanupRegistry, CleanupReport } from "../cleanup/registry.js";
import { DEFAULT_POLL_INTERVAL_MS } from "../config/settings.js";
import type { StructuredLogger } from "../logger.js";
import { sleep } from "../runtime/timers.js";

export type SupervisionState = "RUNNING" | "SESSION_EXITED" | "PROVISIONER_EXITED" | "DONE";

export type SupervisionEndReason = "provisioner_exited" | "interrupted";

export interface SupervisionOutcome {
  reason: SupervisionEndReason;
  /** Number of completed liveness checks. */
  polls: number;
  /** Whether the interactive session was seen exiting while supervised. */
  sessionExited: boolean;
  cleanup: CleanupReport;
}

export interface SupervisionLoopOptions {
  readonly provisioner: SupervisedProcess;
  readonly session: SupervisedProcess;
  readonly registry: CleanupRegistry;
  readonly logger: StructuredLogger;
  readonly pollIntervalMs?: number;
  /** Aborting ends the loop with reason `interrupted`. */
  readonly signal?: AbortSignal;
  /** Observer notified on every state change. */
  readonly onStateChange?: (state: SupervisionState) => void;
}

/**
 * Polls the provisioner and the interactive session until the provisioner is
 * gone or the loop is interrupted, then drains the cleanup registry.
 *
 * A session that exits on its own does not end the loop: the provisioner
 * keeps serving workers to any other client of the same manager, so the run
 * lasts until the provisioner stops or the operator interrupts it.
 */
export class SupervisionLoop {
  private readonly provisioner: SupervisedProcess;
  private readonly session: SupervisedProcess;
  private readonly registry: CleanupRegistry;
  private readonly logger: StructuredLogger;
  private readonly pollIntervalMs: number;
  private readonly signal: AbortSignal | undefined;
  private readonly onStateChange: ((state: SupervisionState) => void) | undefined;
  private currentState: SupervisionState = "RUNNING";
  private running = false;

  constructor(options: SupervisionLoopOptions) {
    this.provisioner = options.provisioner;
    this.session = options.session;
    this.registry = options.registry;
    this.logger = options.logger;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.signal = options.signal;
    this.onStateChange = options.onStateChange;
  }

  get state(): SupervisionState {
    return this.currentState;
  }

  async run(): Promise<SupervisionOutcome> {
    if (this.running || this.currentState === "DONE") {
      throw new Error("supervision loop can only run once");
    }
    this.running = true;
    this.logger.info("supervision_started", {
      provisioner: this.provisioner.label,
      session: this.session.label,
      poll_interval_ms: this.pollIntervalMs,
    });

    let reason: SupervisionEndReason = "interrupted";
    let polls = 0;
    let sessionExited = false;
    let cleanup: CleanupReport;

    try {
      while (await sleep(this.pollIntervalMs, this.signal)) {
        polls += 1;

        if (!this.provisioner.isAlive()) {
          this.logger.info("provisioner_ended", { label: this.provisioner.label, polls });
          this.transition("PROVISIONER_EXITED");
          reason = "provisioner_exited";
          break;
        }

        if (!sessionExited && !this.session.isAlive()) {
          sessionExited = true;
          this.logger.info("session_ended", { label: this.session.label, polls });
          this.transition("SESSION_EXITED");
        }
      }
      if (reason === "interrupted") {
        this.logger.warn("supervision_interrupted", { polls });
      }
    } finally {
      this.transition("DONE");
      this.running = false;
      cleanup = await this.registry.cleanup();
    }

    this.logger.info("supervision_finished", { reason, polls, session_exited: sessionExited });
    return { reason, polls, sessionExited, cleanup };
  }

  private transition(next: SupervisionState): void {
    if (this.currentState === next) {
      return;
    }
    this.currentState = next;
    this.onStateChange?.(next);
  }
}
