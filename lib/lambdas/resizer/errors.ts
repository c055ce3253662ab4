export type FailureKind =
  | "malformed-notification"
  | "decode"
  | "degenerate-metadata"
  | "storage"
  | "persistence"
  | "unexpected"

export type StorageFailureReason = "NotFound" | "AccessDenied" | "Unknown"

/** Base class of every error that aborts a single record. */
export class PipelineError extends Error {
  readonly code: string
  readonly kind: FailureKind

  constructor(message: string, code: string, kind: FailureKind, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "PipelineError"
    this.code = code
    this.kind = kind
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      kind: this.kind,
      message: this.message,
    }
  }
}

export class MalformedNotificationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "MALFORMED_NOTIFICATION", "malformed-notification", options)
    this.name = "MalformedNotificationError"
  }
}

/** Source bytes are not an image the codec can read. */
export class DecodeError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "DECODE_ERROR", "decode", options)
    this.name = "DecodeError"
  }
}

/** Raised when the original byte size is zero and no reduction can be computed. */
export class DivisionByZeroError extends PipelineError {
  constructor(message = "Original image has a byte size of 0") {
    super(message, "DIVISION_BY_ZERO", "degenerate-metadata")
    this.name = "DivisionByZeroError"
  }
}

export class StorageError extends PipelineError {
  readonly reason: StorageFailureReason

  constructor(message: string, reason: StorageFailureReason = "Unknown", options?: { cause?: unknown }) {
    super(message, "STORAGE_ERROR", "storage", options)
    this.name = "StorageError"
    this.reason = reason
  }

  toJSON() {
    return { ...super.toJSON(), reason: this.reason }
  }
}

export class PersistenceError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "PERSISTENCE_ERROR", "persistence", options)
    this.name = "PersistenceError"
  }
}

export class UnexpectedPipelineError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "UNEXPECTED_ERROR", "unexpected", options)
    this.name = "UnexpectedPipelineError"
  }
}

/** Thrown by the handler when the `continue` policy collected one or more record failures. */
export class BatchProcessingError extends Error {
  readonly code = "BATCH_PROCESSING_FAILED"
  readonly failures: PipelineError[]

  constructor(failures: PipelineError[], attempted: number) {
    super(`${failures.length} of ${attempted} records failed: ${failures.map(f => f.message).join("; ")}`)
    this.name = "BatchProcessingError"
    this.failures = failures
  }
}

export class ConfigurationError extends Error {
  readonly variables: string[]

  constructor(variables: string[], details: string) {
    super(`Invalid configuration for ${variables.join(", ")}: ${details}`)
    this.name = "ConfigurationError"
    this.variables = variables
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function toPipelineError(err: unknown): PipelineError {
  if (err instanceof PipelineError) {
    return err
  }
  return new UnexpectedPipelineError(errorMessage(err), { cause: err })
}
