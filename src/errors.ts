/**
 * Error taxonomy shared by every phase of a run. Each error carries a stable
 * `code` surfaced in logs, a short remediation `hint` and structured `details`
 * so the CLI can print which phase failed without parsing messages.
 */
export type ErrorDetails = Record<string, unknown>;

export abstract class FloabilityError extends Error {
  /** Stable machine-readable identifier. */
  public abstract readonly code: string;
  /** Action-oriented hint printed alongside the message. */
  public abstract readonly hint: string;
  /** Structured metadata forwarded to the logger. */
  public readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.details = details;
  }

  /** Payload shape used when the error is logged. */
  toLogPayload(): ErrorDetails {
    return { code: this.code, message: this.message, hint: this.hint, ...this.details };
  }
}

/** The base directory is missing, not a directory, or not writable. */
export class AllocationError extends FloabilityError {
  public readonly code = "E-ALLOC";
  public readonly hint = "point --base-dir at an existing writable directory";
}

/**
 * An archive member (or a path derived from user input) resolves outside of
 * the directory it must stay in. Always fatal.
 */
export class PathTraversalError extends FloabilityError {
  public readonly code = "E-PATH-TRAVERSAL";
  public readonly hint = "the archive may be malicious; rebuild it from a trusted source";
  public readonly attemptedPath: string;
  public readonly rootDirectory: string;

  constructor(message: string, attemptedPath: string, rootDirectory: string, extras: ErrorDetails = {}) {
    super(message, { attemptedPath, rootDirectory, ...extras });
    this.attemptedPath = attemptedPath;
    this.rootDirectory = rootDirectory;
  }
}

export class ExtractionError extends FloabilityError {
  public readonly code = "E-EXTRACT";
  public readonly hint = "check that the environment archive is a complete tar or tar.gz file";
}

export class StagingWriteError extends FloabilityError {
  public readonly code = "E-STAGING-WRITE";
  public readonly hint = "check permissions and free space in the run directory";
}

/** The unpack fixup exited with a non-zero status or could not start. */
export class FixupError extends FloabilityError {
  public readonly code = "E-FIXUP";
  public readonly hint = "make sure conda and conda-pack are installed and on PATH";
  /** Combined stdout/stderr of the fixup command. */
  public readonly output: string;
  public readonly exitCode: number | null;

  constructor(message: string, output: string, exitCode: number | null, cause?: unknown) {
    super(message, { exitCode, output }, cause);
    this.output = output;
    this.exitCode = exitCode;
  }
}

export class SpawnError extends FloabilityError {
  public readonly code = "E-SPAWN";
  public readonly hint = "make sure the executable exists and is on PATH";
}

/** Soft error: collected by the cleanup registry, never raised past it. */
export class TerminationError extends FloabilityError {
  public readonly code = "E-TERMINATE";
  public readonly hint = "the process may need to be killed manually";
}

export class MaterializationError extends FloabilityError {
  public readonly code = "E-MATERIALIZE";
  public readonly hint = "check the environment description and that poncho_package_create is on PATH";
}

export class DataFetchError extends FloabilityError {
  public readonly code = "E-DATA-FETCH";
  public readonly hint = "check the data spec entries and their sources";
}

export class InvalidOptionsError extends FloabilityError {
  public readonly code = "E-OPTIONS";
  public readonly hint = "run `floability --help` for the accepted flags";
}

/** Phases of a run that can abort it before supervision starts. */
export type RunPhase = "options" | "allocate" | "fetch" | "materialize" | "stage" | "spawn";

/** Raised by `run()` once cleanup has completed for an aborted run. */
export class RunAbortedError extends FloabilityError {
  public readonly code = "E-RUN-ABORTED";
  public readonly hint = "see the cause for the failing phase";
  public readonly phase: RunPhase;

  constructor(phase: RunPhase, cause: unknown) {
    super(`run aborted during ${phase}: ${cause instanceof Error ? cause.message : String(cause)}`, { phase }, cause);
    this.phase = phase;
  }
}

/** Errors raised by the staging steps. */
export type StagingError = ExtractionError | PathTraversalError | StagingWriteError | FixupError;
