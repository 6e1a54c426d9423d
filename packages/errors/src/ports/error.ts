export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error, e.g. the rejected input length or
 * the reason a decode failed.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call could succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected failures caused by the caller's input (a malformed
   * encoded tag, a bad configuration value). `false` for broken invariants.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe shape of an error, used by the logger and by `toJSON()`.
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
