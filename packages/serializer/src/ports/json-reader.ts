import type { JsonTokenKind } from "./json-value"

/**
 * Read side of the host engine, positioned on a single JSON token.
 *
 * @remarks
 * Every `read*` method throws `MalformedValueError` when the current token is of a
 * different kind. Converters should check {@link JsonReader.tokenKind} first when
 * they accept more than one kind.
 */
export interface JsonReader {
  tokenKind(): JsonTokenKind

  readString(): string
  readNumber(): number
  readBoolean(): boolean
  readNull(): null

  /** Reader for a property of the current object token; kind `"none"` when missing. */
  property(name: string): JsonReader
}
