/**
 * Error codes carried by RealtimeDatabaseError.
 */
export type RealtimeDatabaseErrorCode =
  | `INVALID_OPTIONS`
  | `TOO_MANY_REDIRECTS`
  | `STREAM_FAILED`

/**
 * Error thrown when a response body cannot be read.
 */
export class FetchError extends Error {
  status: number
  headers: Record<string, string>

  constructor(
    status: number,
    headers: Record<string, string>,
    public url: string,
    message?: string
  ) {
    super(message || `HTTP Error ${status} at ${url}`)
    this.name = `FetchError`
    this.status = status
    this.headers = headers
  }
}

/**
 * Client-level error for Realtime Database operations.
 */
export class RealtimeDatabaseError extends Error {
  /**
   * HTTP status code, if applicable.
   */
  status?: number

  /**
   * Structured error code for programmatic handling.
   */
  code: RealtimeDatabaseErrorCode

  /**
   * Additional error details (e.g., the underlying error).
   */
  details?: unknown

  constructor(
    message: string,
    code: RealtimeDatabaseErrorCode,
    status?: number,
    details?: unknown
  ) {
    super(message)
    this.name = `RealtimeDatabaseError`
    this.code = code
    this.status = status
    this.details = details
  }

  /**
   * Wrap a failure of a stream's request or body read.
   */
  static fromStreamFailure(error: unknown, url: string): RealtimeDatabaseError {
    if (error instanceof RealtimeDatabaseError) {
      return error
    }
    const reason = error instanceof Error ? error.message : String(error)
    const status = error instanceof FetchError ? error.status : undefined
    return new RealtimeDatabaseError(
      `Event stream failed at ${url}: ${reason}`,
      `STREAM_FAILED`,
      status,
      error
    )
  }
}
