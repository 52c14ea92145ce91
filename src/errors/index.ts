/**
 * Error taxonomy for backup runs.
 *
 * Every error carries a stable `code` that ends up in the run report.
 * Pre-flight errors (scheme, service and key resolution) abort a run before
 * any container is touched. Task errors are recorded per backup target and
 * the run continues. `ResumeFailureError` means a container may have been
 * left stopped.
 */

export type ErrorCode =
  | "SchemeInvalid"
  | "TopologyInvalid"
  | "ServiceNotFound"
  | "KeyResolutionError"
  | "PathNotFound"
  | "VolumeNotFound"
  | "DumpError"
  | "CopyError"
  | "HelperContainerError"
  | "CleanupError"
  | "ArchiveError"
  | "RotationError"
  | "PauseError"
  | "ResumeFailure"
  | "Cancelled";

export abstract class StowawayError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The scheme file is unreadable or structurally wrong. Lists every problem.
 */
export class SchemeInvalidError extends StowawayError {
  readonly code = "SchemeInvalid";

  constructor(
    message: string,
    public readonly problems: string[] = [],
  ) {
    super(problems.length > 0 ? `${message}:\n  - ${problems.join("\n  - ")}` : message);
  }
}

/**
 * The compose file is missing, ambiguous or cannot be parsed.
 */
export class TopologyError extends StowawayError {
  readonly code = "TopologyInvalid";
}

export class ServiceNotFoundError extends StowawayError {
  readonly code = "ServiceNotFound";

  constructor(public readonly service: string) {
    super(`Service not found in topology: ${service}`);
  }
}

export class KeyResolutionError extends StowawayError {
  readonly code = "KeyResolutionError";

  constructor(
    public readonly keyPath: string,
    public readonly missingSegment: string,
  ) {
    super(`Cannot resolve "${keyPath}": no "${missingSegment}"`);
  }
}

export class PathNotFoundError extends StowawayError {
  readonly code = "PathNotFound";

  constructor(public readonly path: string) {
    super(`Bind mount directory not found: ${path}`);
  }
}

export class VolumeNotFoundError extends StowawayError {
  readonly code = "VolumeNotFound";

  constructor(public readonly volume: string) {
    super(`Docker volume not found: ${volume}`);
  }
}

export class DumpError extends StowawayError {
  readonly code = "DumpError";
}

export class CopyError extends StowawayError {
  readonly code = "CopyError";
}

export class HelperContainerError extends StowawayError {
  readonly code = "HelperContainerError";
}

/** Leftovers could not be removed. Logged, never fatal to the artifact. */
export class CleanupError extends StowawayError {
  readonly code = "CleanupError";
}

export class ArchiveError extends StowawayError {
  readonly code = "ArchiveError";
}

export class RotationError extends StowawayError {
  readonly code = "RotationError";
}

/** A container could not be stopped; the ones already stopped were resumed. */
export class PauseError extends StowawayError {
  readonly code = "PauseError";

  constructor(
    public readonly service: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * One or more containers could not be started again. `cause` holds the error
 * the paused body failed with, if it failed.
 */
export class ResumeFailureError extends StowawayError {
  readonly code = "ResumeFailure";

  constructor(
    public readonly services: string[],
    public readonly errors: unknown[],
    options?: { cause?: unknown },
  ) {
    super(
      `Failed to restart ${services.join(", ")}: ${errors.map(errorMessage).join("; ")}`,
      options,
    );
  }
}

export class CancelledError extends StowawayError {
  readonly code = "Cancelled";

  constructor(message: string = "Backup run cancelled") {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string {
  return error instanceof StowawayError ? error.code : "TaskError";
}

/**
 * Narrow a caught value to a Node.js system error, optionally with a given code
 */
export function isErrnoException(error: unknown, code?: string): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && (code === undefined || error.code === code);
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
