import { ValueJsonReader } from "../adapters/json/value-json-reader"
import { ValueJsonWriter } from "../adapters/json/value-json-writer"
import { NullLogger } from "../adapters/logger/null-logger"
import type { ConverterFactory, JsonConverter } from "../ports/json-converter"
import type { JsonReader } from "../ports/json-reader"
import type { JsonValue } from "../ports/json-value"
import type { JsonWriter } from "../ports/json-writer"
import type { Logger } from "../ports/logger"
import type { Infer, TypeDescriptor } from "../ports/type-descriptor"
import {
  InvalidWriterStateError,
  MalformedDocumentError,
  MalformedValueError,
  type SerializationDirection,
  SerializationError,
  UnsupportedTypeError,
} from "./errors/errors"
import { describeValue, isRecord, joinPath } from "./values"

export const ROOT_PATH = "$"

export type JsonSerializerDeps = {
  /** Consulted in order; the first factory that can convert a type wins. */
  converters?: readonly ConverterFactory[]
  logger?: Logger
}

/**
 * Host serialization engine.
 *
 * Walks a type descriptor, hands each value to the converter registered for its
 * declared type and handles records, optionals and primitives itself.
 */
export class JsonSerializer {
  private readonly converters: readonly ConverterFactory[]
  private readonly logger: Logger
  private readonly resolved = new WeakMap<TypeDescriptor, JsonConverter<unknown> | null>()

  constructor(deps: JsonSerializerDeps = {}) {
    this.converters = deps.converters ?? []
    this.logger = (deps.logger ?? new NullLogger()).child({ component: "json-serializer" })
  }

  serialize<D extends TypeDescriptor>(type: D, value: Infer<D>): string {
    const writer = new ValueJsonWriter()
    this.writeValue(type, value, writer, ROOT_PATH)
    return JSON.stringify(this.collect(writer))
  }

  deserialize<D extends TypeDescriptor>(type: D, text: string): Infer<D> {
    const document = this.parse(text)
    // readValue checks every token against `type` before building the value
    return this.readValue(type, new ValueJsonReader(document), ROOT_PATH) as Infer<D>
  }

  /**
   * Converter registered for `type`, or `null` when the built-in handling applies.
   * The result is cached per descriptor.
   */
  converterFor(type: TypeDescriptor): JsonConverter<unknown> | null {
    const cached = this.resolved.get(type)
    if (cached !== undefined) return cached

    const factory = this.converters.find((candidate) => candidate.canConvert(type))
    const converter = factory?.createConverter(type) ?? null

    this.resolved.set(type, converter)
    this.logger.trace(converter ? "resolved converter" : "using builtin handling", {
      typeKind: type.kind,
    })

    return converter
  }

  private parse(text: string): JsonValue {
    try {
      return JSON.parse(text)
    } catch (err) {
      const error = new MalformedDocumentError(err)
      this.logger.debug("rejected document", { err: error })
      throw error
    }
  }

  private readValue(type: TypeDescriptor, reader: JsonReader, path: string): unknown {
    return this.atPath("deserialize", path, () => {
      if (type.kind === "optional" && reader.tokenKind() === "none") return null

      const converter = this.converterFor(type)
      if (converter) return converter.read(reader)

      switch (type.kind) {
        case "string":
          return reader.readString()
        case "number":
          return reader.readNumber()
        case "boolean":
          return reader.readBoolean()
        case "optional":
          if (reader.tokenKind() === "null") return reader.readNull()
          return this.readValue(type.inner, reader, path)
        case "record": {
          const kind = reader.tokenKind()
          if (kind !== "object") {
            throw new MalformedValueError({ expected: "object", actual: kind })
          }

          return Object.fromEntries(
            Object.entries(type.fields).map(([name, field]) => [
              name,
              this.readValue(field, reader.property(name), joinPath(path, name)),
            ]),
          )
        }
        case "enum":
          throw new UnsupportedTypeError(type)
      }
    })
  }

  private writeValue(
    type: TypeDescriptor,
    value: unknown,
    writer: JsonWriter,
    path: string,
  ): void {
    this.atPath("serialize", path, () => {
      const present = type.kind === "optional" && value === undefined ? null : value

      const converter = this.converterFor(type)
      if (converter) return converter.write(writer, present)

      switch (type.kind) {
        case "string":
          if (typeof present !== "string") throw mismatch("string", present)
          return writer.writeString(present)
        case "number":
          if (typeof present !== "number" || !Number.isFinite(present)) {
            throw mismatch("finite number", present)
          }
          return writer.writeNumber(present)
        case "boolean":
          if (typeof present !== "boolean") throw mismatch("boolean", present)
          return writer.writeBoolean(present)
        case "optional":
          if (present === null) return writer.writeNull()
          return this.writeValue(type.inner, present, writer, path)
        case "record":
          if (!isRecord(present)) throw mismatch("object", present)

          writer.writeObject()
          for (const [name, field] of Object.entries(type.fields)) {
            const fieldValue = Object.hasOwn(present, name) ? present[name] : undefined
            this.writeValue(field, fieldValue, writer.writeProperty(name), joinPath(path, name))
          }
          return
        case "enum":
          throw new UnsupportedTypeError(type)
      }
    })
  }

  /** A converter that wrote nothing surfaces here, at the path of its writer. */
  private collect(writer: ValueJsonWriter): JsonValue {
    try {
      return writer.toJsonValue()
    } catch (err) {
      const path = err instanceof InvalidWriterStateError ? err.path : ROOT_PATH
      throw this.failure("serialize", path, err)
    }
  }

  private atPath<T>(direction: SerializationDirection, path: string, run: () => T): T {
    try {
      return run()
    } catch (err) {
      if (err instanceof SerializationError) throw err
      throw this.failure(direction, path, err)
    }
  }

  private failure(
    direction: SerializationDirection,
    path: string,
    cause: unknown,
  ): SerializationError {
    const error = new SerializationError(direction, path, cause)
    this.logger.debug(`${direction} failed`, { path, err: error })
    return error
  }
}

function mismatch(expected: string, value: unknown): MalformedValueError {
  return new MalformedValueError({ expected, actual: describeValue(value) })
}
