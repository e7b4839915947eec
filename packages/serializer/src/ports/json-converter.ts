import type { JsonReader } from "./json-reader"
import type { JsonWriter } from "./json-writer"
import type { TypeDescriptor } from "./type-descriptor"

/**
 * Converts a single value to and from one JSON token.
 *
 * The host engine takes care of the surrounding structure (objects, field names).
 * Converters should be stateless so one instance can be cached per type.
 */
export interface JsonConverter<T> {
  read(reader: JsonReader): T
  write(writer: JsonWriter, value: T): void
}

/**
 * Plug-in point of the host engine.
 *
 * The engine asks each registered factory, in order, whether it handles a declared
 * type and caches the converter of the first one that does. A `null` converter makes
 * the engine fall back to its built-in handling.
 */
export interface ConverterFactory {
  canConvert(type: TypeDescriptor): boolean
  createConverter(type: TypeDescriptor): JsonConverter<unknown> | null
}
