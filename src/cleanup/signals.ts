import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { StructuredLogger } from "../logger.js";
import { describeError, signalExitCode, type SignalName } from "../nodePrimitives.js";
import type { CleanupRegistry } from "./registry.js";

/** Minimal emitter surface the bridge needs; `process` satisfies it. */
export interface SignalTarget {
  on(event: SignalName, listener: () => void): unknown;
  off(event: SignalName, listener: () => void): unknown;
}

export type ExitFunction = (code: number) => void;

export interface SignalBridgeOptions {
  readonly registry: CleanupRegistry;
  readonly logger: StructuredLogger;
  /** Signals to intercept, SIGINT and SIGTERM by default. */
  readonly signals?: readonly SignalName[];
  readonly target?: SignalTarget;
  readonly exit?: ExitFunction;
}

const DEFAULT_SIGNALS: readonly SignalName[] = ["SIGINT", "SIGTERM"];

/**
 * Routes interruption signals to the run's {@link CleanupRegistry}: the first
 * signal awaits the cleanup pass (joining it when normal shutdown already
 * started one) and ends the process with `128 + signo`.
 */
export class SignalBridge {
  private readonly registry: CleanupRegistry;
  private readonly logger: StructuredLogger;
  private readonly signals: readonly SignalName[];
  private readonly target: SignalTarget;
  private readonly exit: ExitFunction;
  private readonly listeners = new Map<SignalName, () => void>();
  private installed = false;
  private shuttingDown: SignalName | null = null;

  constructor(options: SignalBridgeOptions) {
    this.registry = options.registry;
    this.logger = options.logger;
    this.signals = options.signals ?? DEFAULT_SIGNALS;
    this.target = options.target ?? process;
    this.exit = options.exit ?? ((code: number) => process.exit(code));
  }

  get isInstalled(): boolean {
    return this.installed;
  }

  /** Signal that triggered the shutdown, if any. */
  get receivedSignal(): SignalName | null {
    return this.shuttingDown;
  }

  /**
   * Attaches the listeners. Must run before the first obligation is
   * registered so that a signal arriving mid-staging still releases it.
   */
  install(): void {
    if (this.installed) {
      throw new Error("signal bridge is already installed");
    }
    if (this.registry.processCount > 0 || this.registry.directoryCount > 0) {
      this.logger.warn("signal_bridge_installed_late", {
        processes: this.registry.processCount,
        directories: this.registry.directoryCount,
      });
    }
    for (const signal of this.signals) {
      const listener = () => this.onSignal(signal);
      this.listeners.set(signal, listener);
      this.target.on(signal, listener);
    }
    this.installed = true;
  }

  uninstall(): void {
    for (const [signal, listener] of this.listeners) {
      this.target.off(signal, listener);
    }
    this.listeners.clear();
    this.installed = false;
  }

  private onSignal(signal: SignalName): void {
    if (this.shuttingDown) {
      this.logger.warn("shutdown_signal_repeated", { signal, first: this.shuttingDown });
      return;
    }
    this.shuttingDown = signal;
    this.logger.warn("shutdown_signal", { signal });

    const code = signalExitCode(signal);
    this.registry.cleanup().then(
      (report) => {
        this.logger.info("shutdown_complete", { signal, exit_code: code, failures: report.failures.length });
        this.exit(code);
      },
      (error: unknown) => {
        this.logger.error("shutdown_cleanup_failed", { signal, message: describeError(error) });
        this.exit(code);
      },
    );
  }
}
