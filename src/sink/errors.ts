// src/sink/errors.ts — Failure taxonomy for the diagnostic sink
//
// None of these are fatal. Each unit of work (one append, one monitor step,
// one upload) catches its failure and turns it into a log line or report entry.

export class SinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "SinkError"
  }
}

/** Local write failed; the record is dropped. */
export class AppendError extends SinkError {
  constructor(readonly segmentPath: string, cause?: unknown) {
    super(`Append to ${segmentPath} failed: ${describe(cause)}`, { cause })
    this.name = "AppendError"
  }
}

/** New segment could not be created; the previous one stays active. */
export class RotationError extends SinkError {
  constructor(readonly segmentPath: string, cause?: unknown) {
    super(`Rotation to ${segmentPath} failed: ${describe(cause)}`, { cause })
    this.name = "RotationError"
  }
}

/** Retired segment could not be closed; retried on the next reclaim pass. */
export class ReclaimError extends SinkError {
  constructor(readonly segmentPath: string, cause?: unknown) {
    super(`Closing ${segmentPath} failed: ${describe(cause)}`, { cause })
    this.name = "ReclaimError"
  }
}

export class UploadError extends SinkError {
  constructor(readonly segmentPath: string, readonly objectKey: string, cause?: unknown) {
    super(`Upload of ${segmentPath} as ${objectKey} failed: ${describe(cause)}`, { cause })
    this.name = "UploadError"
  }
}

/** Segment directory could not be read; nothing was uploaded. */
export class ListingError extends SinkError {
  constructor(readonly dir: string, cause?: unknown) {
    super(`Listing segments in ${dir} failed: ${describe(cause)}`, { cause })
    this.name = "ListingError"
  }
}

export class SinkStateError extends SinkError {
  constructor(message: string) {
    super(message)
    this.name = "SinkStateError"
  }
}

export class ConfigError extends SinkError {
  constructor(message: string) {
    super(message)
    this.name = "ConfigError"
  }
}

function describe(cause: unknown): string {
  if (cause === undefined) return "unknown error"
  return cause instanceof Error ? cause.message : String(cause)
}
