import type { AppError } from "../../ports/error"
import { isRecord } from "../values"

/**
 * True for errors raised by the serializer or a converter, including those thrown by
 * another installed copy of this package, which `instanceof BaseError` misses.
 *
 * @example
 * ```ts
 * try {
 *   serializer.deserialize(Permissions, body)
 * } catch (err) {
 *   if (isAppError(err)) reply(400, { code: err.code, path: err.context.path })
 *   else throw err
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  return (
    e instanceof Error &&
    "code" in e &&
    typeof e.code === "string" &&
    "context" in e &&
    isRecord(e.context) &&
    "isOperational" in e &&
    typeof e.isOperational === "boolean" &&
    "timestamp" in e &&
    e.timestamp instanceof Date
  )
}
