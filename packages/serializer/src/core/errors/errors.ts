import type { TypeDescriptor } from "../../ports/type-descriptor"
import { BaseError } from "./base-error"
import { isAppError } from "./is-app-error"

export type MalformedValueDetails = Readonly<{
  expected: string
  actual: string
}>

/** The token presented to a converter is not one of the kinds it accepts. */
export class MalformedValueError extends BaseError<"malformed_value"> {
  constructor(details: MalformedValueDetails) {
    super(`Expected ${details.expected} but found ${details.actual}`, {
      code: "malformed_value",
      context: details,
    })
  }
}

export class MalformedDocumentError extends BaseError<"malformed_document"> {
  constructor(cause: unknown) {
    super(`Document is not valid JSON: ${messageOf(cause)}`, {
      code: "malformed_document",
      cause,
    })
  }
}

/** A declared type has neither a converter nor built-in handling. */
export class UnsupportedTypeError extends BaseError<"unsupported_type"> {
  constructor(type: TypeDescriptor) {
    super(`No converter registered for ${describeType(type)}`, {
      code: "unsupported_type",
      context: { typeKind: type.kind },
      isOperational: false,
    })
  }
}

/** A JsonWriter was used out of order: a second value, or no value at all. */
export class InvalidWriterStateError extends BaseError<"invalid_writer_state"> {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message, {
      code: "invalid_writer_state",
      context: { path },
      isOperational: false,
    })
  }
}

export type SerializationDirection = "serialize" | "deserialize"

/**
 * Failure at a specific field. The converter or reader error is kept as `cause`
 * and its context is merged with the field `path`.
 */
export class SerializationError extends BaseError<
  "serialization_failed" | "deserialization_failed"
> {
  readonly path: string

  constructor(direction: SerializationDirection, path: string, cause: unknown) {
    const app = isAppError(cause) ? cause : undefined

    super(`Failed to ${direction} value at ${path}: ${messageOf(cause)}`, {
      code: direction === "serialize" ? "serialization_failed" : "deserialization_failed",
      context: { ...app?.context, path },
      cause,
      isOperational: app?.isOperational ?? false,
    })

    this.path = path
  }
}

/** Serializer settings that fail the schema; `sources` lists where they were read from. */
export class ConfigValidationError extends BaseError<"invalid_config"> {
  constructor(details: string, sources: readonly string[]) {
    super(`Invalid serializer settings from ${sources.join(", ") || "defaults"}:\n${details}`, {
      code: "invalid_config",
      context: { sources },
      isOperational: false,
    })
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function describeType(type: TypeDescriptor): string {
  switch (type.kind) {
    case "enum":
    case "record":
      return `${type.kind} ${type.name}`
    case "optional":
      return `optional ${describeType(type.inner)}`
    default:
      return type.kind
  }
}
