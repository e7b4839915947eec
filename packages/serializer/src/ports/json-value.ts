export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

/**
 * Kind of the token a reader is positioned on.
 *
 * `"none"` stands for a missing token, e.g. a record field absent from the document.
 */
export type JsonTokenKind =
  | "string"
  | "number"
  | "boolean"
  | "null"
  | "object"
  | "array"
  | "none"
