export type ErrorCode = Lowercase<string>

/**
 * Structured metadata carried by an error: offsets, lengths, codec and key
 * names. Kept as data so logs and serializers never have to parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for failures caused by the input (a truncated buffer, a value
   * outside a codec's domain, bad configuration). `false` for invariant
   * violations that mean the library's own state is corrupt.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe error shape, used by the pino serializers and `toJSON`.
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
