import { InvalidWriterStateError } from "../../core/errors/errors"
import { joinPath } from "../../core/values"
import type { JsonValue } from "../../ports/json-value"
import type { JsonWriter } from "../../ports/json-writer"

/**
 * JsonWriter that builds a plain JSON value, ready for `JSON.stringify`.
 */
export class ValueJsonWriter implements JsonWriter {
  private value: JsonValue | undefined
  private properties: Map<string, ValueJsonWriter> | undefined

  /** @param path where this writer sits in the document, used in error messages */
  constructor(private readonly path = "$") {}

  writeString(value: string): void {
    this.assign(value)
  }

  writeNumber(value: number): void {
    this.assign(value)
  }

  writeBoolean(value: boolean): void {
    this.assign(value)
  }

  writeNull(): void {
    this.assign(null)
  }

  writeObject(): void {
    this.objectProperties()
  }

  writeProperty(name: string): JsonWriter {
    const properties = this.objectProperties()

    const existing = properties.get(name)
    if (existing) return existing

    const child = new ValueJsonWriter(joinPath(this.path, name))
    properties.set(name, child)
    return child
  }

  toJsonValue(): JsonValue {
    if (this.properties) {
      return Object.fromEntries(
        [...this.properties].map(([name, child]): [string, JsonValue] => [
          name,
          child.toJsonValue(),
        ]),
      )
    }

    if (this.value === undefined) {
      throw new InvalidWriterStateError(`No value was written at ${this.path}`, this.path)
    }

    return this.value
  }

  private objectProperties(): Map<string, ValueJsonWriter> {
    if (this.value !== undefined) throw this.alreadyWritten()

    this.properties ??= new Map()
    return this.properties
  }

  private assign(value: JsonValue): void {
    if (this.value !== undefined || this.properties) throw this.alreadyWritten()
    this.value = value
  }

  private alreadyWritten(): InvalidWriterStateError {
    return new InvalidWriterStateError(`A value was already written at ${this.path}`, this.path)
  }
}
