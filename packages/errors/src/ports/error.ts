export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: the path that failed, the
 * offending section, the list of validation issues.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if retrying might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (missing file, malformed document,
   * schema mismatch, permission denied); `false` for invariant violations.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause, usually the Node.js errno exception or the
   * `SyntaxError` raised by `JSON.parse`.
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logs. JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
