import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  /** `false` for broken definitions and misuse of the API. Defaults to `true`. */
  isOperational?: boolean
}>

/** Root of every error the serializer and its converters throw. */
export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp = new Date()

  constructor(
    message: string,
    { code, context, cause, isOperational = true }: BaseErrorOptions<C>,
  ) {
    super(message, { cause })

    this.name = new.target.name
    this.code = code
    this.context = Object.freeze({ ...context })
    this.isOperational = isOperational

    Error.captureStackTrace(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

/**
 * JSON-safe view of a thrown value and its cause chain. Errors that are not ours get
 * the code "unknown" and count as non-operational.
 */
export function serializeError(err: unknown): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const own = err instanceof BaseError ? err : undefined

  return {
    name: err.name,
    code: own?.code ?? "unknown",
    message: err.message,
    context: { ...own?.context },
    isOperational: own?.isOperational ?? false,
    timestamp: (own?.timestamp ?? new Date()).toISOString(),
    ...(err.cause !== undefined && { cause: serializeError(err.cause) }),
  }
}
