import { Writable } from "node:stream"
import { mock } from "vitest-mock-extended"
import { ObjectSource } from "../../adapters/config/object-source"
import type { Logger } from "../../ports/logger"
import { ConfigValidationError } from "../errors/errors"
import { JsonSerializer } from "../json-serializer"
import { createJsonSerializer, createLoggerFromConfig } from "../create-serializer"
import { t } from "../types/t"

function captureLines() {
  const lines: string[] = []
  const destination = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(chunk.toString("utf8"))
      callback()
    },
  })
  return { lines, destination }
}

describe("createJsonSerializer", () => {
  it("creates a serializer without any options", () => {
    const serializer = createJsonSerializer()

    expect(serializer).toBeInstanceOf(JsonSerializer)
    expect(serializer.serialize(t.optional(t.boolean()), null)).toBe("null")
  })

  it("loads its logging settings from the given sources", () => {
    const { lines, destination } = captureLines()

    const serializer = createJsonSerializer({
      sources: [new ObjectSource({ LOG_LEVEL: "debug" })],
      loggerDeps: { destination },
    })

    expect(() => serializer.deserialize(t.number(), "{")).toThrow()
    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0]!)).toMatchObject({
      level: 20,
      msg: "rejected document",
      component: "json-serializer",
    })
  })

  it("prefers an explicit config over sources", () => {
    const { lines, destination } = captureLines()

    const serializer = createJsonSerializer({
      config: { LOG_LEVEL: "info", LOG_PRETTY: false },
      sources: [new ObjectSource({ LOG_LEVEL: "debug" })],
      loggerDeps: { destination },
    })

    expect(() => serializer.deserialize(t.number(), "{")).toThrow()
    expect(lines).toEqual([])
  })

  it("uses an injected logger without reading the sources", () => {
    const logger = mock<Logger>()
    logger.child.mockReturnValue(logger)

    const serializer = createJsonSerializer({
      logger,
      sources: [new ObjectSource({ LOG_LEVEL: "loud" })],
    })

    expect(serializer).toBeInstanceOf(JsonSerializer)
    expect(logger.child).toHaveBeenCalledWith({ component: "json-serializer" })
  })

  it("rejects invalid settings from the sources", () => {
    expect(() =>
      createJsonSerializer({ sources: [new ObjectSource({ LOG_LEVEL: "loud" })] }),
    ).toThrow(ConfigValidationError)
  })
})

describe("createLoggerFromConfig", () => {
  it("honors the configured level and tags the component", () => {
    const { lines, destination } = captureLines()

    const logger = createLoggerFromConfig(
      { LOG_LEVEL: "warn", LOG_PRETTY: false },
      { destination },
    )

    logger.info("dropped")
    logger.warn("kept")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0]!)).toMatchObject({ msg: "kept", component: "enumjson" })
  })
})
