export type ErrorCode = Lowercase<string>

/** Offending value, field path, enum name and similar data attached to an error. */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /**
   * `true` for bad input such as malformed documents and unknown enum names;
   * `false` for programmer errors such as invalid enum definitions or unsupported
   * types.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** Shape written to logs and error responses. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
}>
