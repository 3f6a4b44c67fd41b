/**
 * Error taxonomy for lifecycle operations.
 *
 * Every error carries the stage it was raised in and whether retrying the whole
 * operation can help. Tool output, when there is any, travels in `detail`.
 */

export type Stage =
  | "resolve"
  | "fetch"
  | "patch"
  | "compile"
  | "register"
  | "patch-manifest"
  | "apply"
  | "validate"
  | "prereqs";

export class CocoError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage: Stage,
    public readonly retryable: boolean,
    public readonly detail: string | null = null,
  ) {
    super(message);
    this.name = "CocoError";
  }
}

export class ConfigurationError extends CocoError {
  constructor(message: string, detail: string | null = null) {
    super(message, "CONFIGURATION_ERROR", "resolve", false, detail);
    this.name = "ConfigurationError";
  }
}

export class SourceFetchError extends CocoError {
  constructor(
    message: string,
    public readonly component: string,
    detail: string | null = null,
  ) {
    super(message, "SOURCE_FETCH_ERROR", "fetch", true, detail);
    this.name = "SourceFetchError";
  }
}

export class PatchApplyError extends CocoError {
  constructor(
    message: string,
    public readonly component: string,
    public readonly patches: string[],
    detail: string | null = null,
  ) {
    super(message, "PATCH_APPLY_ERROR", "patch", false, detail);
    this.name = "PatchApplyError";
  }
}

export class BuildError extends CocoError {
  constructor(
    message: string,
    public readonly component: string,
    detail: string | null = null,
  ) {
    super(message, "BUILD_ERROR", "compile", false, detail);
    this.name = "BuildError";
  }
}

export class RegistrationError extends CocoError {
  constructor(
    message: string,
    public readonly imageReference: string,
    detail: string | null = null,
  ) {
    super(message, "REGISTRATION_ERROR", "register", true, detail);
    this.name = "RegistrationError";
  }
}

export class UnresolvedReferenceError extends CocoError {
  constructor(
    public readonly components: string[],
    public readonly source: string,
  ) {
    super(
      `${source} references components with no build result: ${components.join(", ")}`,
      "UNRESOLVED_REFERENCE",
      "patch-manifest",
      false,
    );
    this.name = "UnresolvedReferenceError";
  }
}

export class ApplyError extends CocoError {
  constructor(
    message: string,
    public readonly target: string,
    detail: string | null = null,
  ) {
    super(message, "APPLY_ERROR", "apply", false, detail);
    this.name = "ApplyError";
  }
}

export class PrerequisiteError extends CocoError {
  constructor(
    public readonly failed: string[],
    detail: string | null = null,
  ) {
    super(`Missing prerequisites: ${failed.join(", ")}`, "PREREQ_FAILED", "prereqs", false, detail);
    this.name = "PrerequisiteError";
  }
}

/** The operation's signal aborted; `stage` is where it stopped. */
export class CancelledError extends CocoError {
  constructor(stage: Stage) {
    super(`cancelled during ${stage}`, "CANCELLED", stage, false);
    this.name = "CancelledError";
  }
}

/** A child process exited non-zero (or could not be started). */
export class ToolError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly args: string[],
    public readonly exitCode: number | null,
    public readonly stdout: string,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = "ToolError";
  }

  /** Combined output, stderr first since that is where tools put the reason. */
  get output(): string {
    return [this.stderr.trim(), this.stdout.trim()].filter((s) => s.length > 0).join("\n");
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Raw diagnostic text for an unknown failure. */
export function errorDetail(e: unknown): string {
  if (e instanceof ToolError) return e.output || e.message;
  if (e instanceof CocoError) return e.detail ?? e.message;
  return errorMessage(e);
}

export function throwIfCancelled(signal: AbortSignal | undefined, stage: Stage): void {
  if (signal?.aborted) throw new CancelledError(stage);
}

/**
 * Keep lifecycle errors as they are; anything else is attributed to `stage`.
 * Once `signal` has aborted, whatever failed is reported as a cancellation.
 */
export function toCocoError(e: unknown, stage: Stage, signal?: AbortSignal): CocoError {
  if (signal?.aborted && !(e instanceof CancelledError)) {
    return new CancelledError(e instanceof CocoError ? e.stage : stage);
  }
  if (e instanceof CocoError) return e;
  return new CocoError(errorMessage(e), "UNEXPECTED_ERROR", stage, false, errorDetail(e));
}
