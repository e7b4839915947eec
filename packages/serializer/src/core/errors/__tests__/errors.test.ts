import { isAppError } from "../is-app-error"
import {
  ConfigValidationError,
  InvalidWriterStateError,
  MalformedDocumentError,
  MalformedValueError,
  SerializationError,
  UnsupportedTypeError,
} from "../errors"

describe("MalformedValueError", () => {
  it("describes the expected and actual token kinds", () => {
    const err = new MalformedValueError({ expected: "string", actual: "number" })

    expect(err.message).toBe("Expected string but found number")
    expect(err.code).toBe("malformed_value")
    expect(err.context).toEqual({ expected: "string", actual: "number" })
    expect(err.isOperational).toBe(true)
  })
})

describe("MalformedDocumentError", () => {
  it("keeps the parser error as cause", () => {
    const cause = new SyntaxError("Unexpected end of JSON input")
    const err = new MalformedDocumentError(cause)

    expect(err.message).toBe("Document is not valid JSON: Unexpected end of JSON input")
    expect(err.cause).toBe(cause)
  })
})

describe("UnsupportedTypeError", () => {
  it("names the type and is not operational", () => {
    const err = new UnsupportedTypeError({
      kind: "optional",
      inner: { kind: "enum", name: "Color", definition: { Red: 0 } },
    })

    expect(err.message).toBe("No converter registered for optional enum Color")
    expect(err.context).toEqual({ typeKind: "optional" })
    expect(err.isOperational).toBe(false)
  })
})

describe("SerializationError", () => {
  it("adds the path to the cause context", () => {
    const cause = new MalformedValueError({ expected: "string", actual: "null" })
    const err = new SerializationError("deserialize", "$.Access1", cause)

    expect(err.code).toBe("deserialization_failed")
    expect(err.message).toBe(
      "Failed to deserialize value at $.Access1: Expected string but found null",
    )
    expect(err.path).toBe("$.Access1")
    expect(err.context).toEqual({ expected: "string", actual: "null", path: "$.Access1" })
    expect(err.cause).toBe(cause)
    expect(err.isOperational).toBe(true)
  })

  it("treats foreign errors as non-operational", () => {
    const err = new SerializationError("serialize", "$", new TypeError("boom"))

    expect(err.code).toBe("serialization_failed")
    expect(err.context).toEqual({ path: "$" })
    expect(err.isOperational).toBe(false)
  })
})

describe("InvalidWriterStateError", () => {
  it("records the writer path and is not operational", () => {
    const err = new InvalidWriterStateError("No value was written at $.inner", "$.inner")

    expect(err.code).toBe("invalid_writer_state")
    expect(err.context).toEqual({ path: "$.inner" })
    expect(err.isOperational).toBe(false)
  })
})

describe("ConfigValidationError", () => {
  it("names the sources the settings came from", () => {
    const err = new ConfigValidationError("✖ bad", ["env:ENUMJSON_", "overrides"])

    expect(err.message).toBe("Invalid serializer settings from env:ENUMJSON_, overrides:\n✖ bad")
    expect(err.context).toEqual({ sources: ["env:ENUMJSON_", "overrides"] })
  })

  it("falls back to the defaults when no source was read", () => {
    expect(new ConfigValidationError("✖ bad", []).message).toBe(
      "Invalid serializer settings from defaults:\n✖ bad",
    )
  })
})

describe("isAppError", () => {
  it("accepts errors built on BaseError", () => {
    expect(isAppError(new MalformedValueError({ expected: "a", actual: "b" }))).toBe(true)
  })

  it("rejects plain errors and non-objects", () => {
    expect(isAppError(new Error("plain"))).toBe(false)
    expect(isAppError("malformed_value")).toBe(false)
    expect(isAppError(null)).toBe(false)
  })
})
