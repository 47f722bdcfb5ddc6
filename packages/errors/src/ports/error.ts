export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error, such as the file path or cloud
 * resource a failure concerns.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when the same call may succeed later, e.g. a throttled cloud query. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (missing file, denied credentials,
   * unreachable API), `false` for programmer errors.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used when an error is written to a log line.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
