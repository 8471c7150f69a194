/**
 * Error hierarchy for the sync engine.
 *
 * Storage errors propagate to the call site that caused them. Remote errors
 * never leave a drain pass; the coordinator classifies them and reports them
 * through the status channel instead.
 */

/** Base class for engine errors. */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly originalError?: unknown,
  ) {
    super(message)
    this.name = "AppError"
  }
}

/** A local storage operation failed (quota, closed database, aborted transaction). */
export class StorageError extends AppError {
  constructor(message: string, originalError?: unknown) {
    super(message, "STORAGE_ERROR", originalError)
    this.name = "StorageError"
  }
}

/** The record addressed by an operation does not exist in the Local Store. */
export class RecordNotFoundError extends AppError {
  constructor(public readonly recordId: string) {
    super(`Record not found: ${recordId}`, "NOT_FOUND")
    this.name = "RecordNotFoundError"
  }
}

/** A rekey target already exists in the Local Store. */
export class RecordConflictError extends AppError {
  constructor(
    public readonly fromId: string,
    public readonly toId: string,
  ) {
    super(`Cannot move record ${fromId}: ${toId} already exists`, "CONFLICT")
    this.name = "RecordConflictError"
  }
}

/**
 * A call to the remote service failed.
 * `status` is null when no HTTP response was received (network error, timeout).
 */
export class RemoteError extends AppError {
  constructor(
    message: string,
    public readonly status: number | null,
    originalError?: unknown,
  ) {
    super(message, "REMOTE_ERROR", originalError)
    this.name = "RemoteError"
  }
}

/** Caller input failed validation. */
export class ValidationError extends AppError {
  constructor(message: string, originalError?: unknown) {
    super(message, "VALIDATION_ERROR", originalError)
    this.name = "ValidationError"
  }
}

/** Configuration failed validation. */
export class ConfigError extends AppError {
  constructor(message: string, originalError?: unknown) {
    super(message, "CONFIG_ERROR", originalError)
    this.name = "ConfigError"
  }
}

/** Extract a printable message from an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
