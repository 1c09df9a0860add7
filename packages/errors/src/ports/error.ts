export type ErrorCode = Lowercase<string>

/**
 * Structured metadata carried by an error (keys, source names, formats)
 * so that callers never have to parse the message.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when the same operation may succeed if attempted again */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected runtime failure or a programmer error.
   *
   * @remarks
   * - Operational (`true`): a missing key, an unreadable file, a malformed fragment.
   * - Non-operational (`false`): a broken invariant, misuse of an API.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe error shape, used for log payloads.
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

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>
