import type { SupervisedProcess, TerminateOptions, TerminationOutcome } from "../../src/childProcessHandle.js";
import { TerminationError } from "../../src/errors.js";

export interface FakeProcessOptions {
  /** Called inside `terminate()`, before the fake reports its exit. */
  onTerminate?: () => void | Promise<void>;
  /** Makes `terminate()` fail the way a process surviving SIGKILL does. */
  survivesKill?: boolean;
}

/** In-process stand-in for a supervised child, driven by the test. */
export class FakeProcess implements SupervisedProcess {
  public readonly label: string;
  public readonly pid: number;
  public terminateCalls = 0;
  public readonly graceRequests: Array<number | undefined> = [];
  private alive = true;
  private readonly options: FakeProcessOptions;

  constructor(label: string, pid: number, options: FakeProcessOptions = {}) {
    this.label = label;
    this.pid = pid;
    this.options = options;
  }

  isAlive(): boolean {
    return this.alive;
  }

  /** Simulates the process exiting on its own. */
  exit(): void {
    this.alive = false;
  }

  async terminate(options: TerminateOptions = {}): Promise<TerminationOutcome> {
    this.terminateCalls += 1;
    this.graceRequests.push(options.graceMs);
    const wasAlive = this.alive;
    await this.options.onTerminate?.();
    if (this.options.survivesKill) {
      throw new TerminationError(`${this.label} survived SIGKILL`, { label: this.label });
    }
    this.alive = false;
    return { alreadyExited: !wasAlive, forced: false, code: null, signal: wasAlive ? "SIGTERM" : null };
  }
}
