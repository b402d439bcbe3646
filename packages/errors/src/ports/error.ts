export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error (section, option, path, line...).
 * Carried alongside the message so callers never have to parse it back out.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lower snake case identifier for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed (I/O faults) */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (a malformed file, a missing key, a
   * full disk); `false` for programmer misuse such as building an invalid
   * schema or calling an accessor before initialization.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>
