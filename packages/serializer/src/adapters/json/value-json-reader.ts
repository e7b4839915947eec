import { MalformedValueError } from "../../core/errors/errors"
import type { JsonReader } from "../../ports/json-reader"
import type { JsonTokenKind, JsonValue } from "../../ports/json-value"

/**
 * JsonReader over a value already produced by `JSON.parse`.
 * `undefined` stands for a missing token.
 */
export class ValueJsonReader implements JsonReader {
  constructor(private readonly value: JsonValue | undefined) {}

  tokenKind(): JsonTokenKind {
    const value = this.value

    if (value === undefined) return "none"
    if (value === null) return "null"
    if (Array.isArray(value)) return "array"
    if (typeof value === "string") return "string"
    if (typeof value === "number") return "number"
    if (typeof value === "boolean") return "boolean"
    return "object"
  }

  readString(): string {
    if (typeof this.value !== "string") throw this.mismatch("string")
    return this.value
  }

  readNumber(): number {
    if (typeof this.value !== "number") throw this.mismatch("number")
    return this.value
  }

  readBoolean(): boolean {
    if (typeof this.value !== "boolean") throw this.mismatch("boolean")
    return this.value
  }

  readNull(): null {
    if (this.value !== null) throw this.mismatch("null")
    return null
  }

  property(name: string): JsonReader {
    const value = this.value

    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      throw this.mismatch("object")
    }

    return new ValueJsonReader(Object.hasOwn(value, name) ? value[name] : undefined)
  }

  private mismatch(expected: JsonTokenKind): MalformedValueError {
    return new MalformedValueError({ expected, actual: this.tokenKind() })
  }
}
