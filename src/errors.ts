/**
 * Errors that end a sync run.
 *
 * Per-item failures are never thrown past the merge loop; they are recorded
 * as `SyncError` entries on the result instead.
 */

/** Which replica could not be used, and how */
export type InfrastructureErrorCode =
  | "LOCAL_UNREADABLE"
  | "REMOTE_UNREACHABLE"
  | "REMOTE_UNREADABLE";

/**
 * Error thrown when a replica as a whole cannot be used.
 */
export class InfrastructureError extends Error {
  constructor(
    message: string,
    public readonly code: InfrastructureErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "InfrastructureError";
  }
}

/**
 * Error thrown by a record store when `library.yaml` exists but does not
 * match the expected schema.
 */
export class LibraryFormatError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    this.name = "LibraryFormatError";
  }
}

/**
 * Formats any thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error thrown when another process holds a sync lock on a replica.
 */
export class SyncLockError extends Error {
  constructor(
    message: string,
    public readonly lockFile: string
  ) {
    super(message);
    this.name = "SyncLockError";
  }
}
