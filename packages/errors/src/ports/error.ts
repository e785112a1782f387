export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors: feature names, type codes,
 * expected and received counts. Never interpolate these into the message alone.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected failure caused by the input (true) or a
   * broken invariant inside the library (false).
   *
   * @remarks
   * Codec and assembly failures are operational: a malformed tensor fails the
   * request that carried it, not the process.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape, suitable for logs and request-level error responses.
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
