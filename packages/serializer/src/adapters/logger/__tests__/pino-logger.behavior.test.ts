import { Writable } from "node:stream"

import { MalformedValueError } from "../../../core/errors/errors"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { component: "json-serializer" },
    )

    logger.debug("built name table", { enumType: "AccessType", members: 3 })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0]!)

    expect(payload).toMatchObject({
      level: 20,
      msg: "built name table",
      component: "json-serializer",
      enumType: "AccessType",
      members: 3,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("child() inherits the base logger sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { component: "root" })
    const child = base.child({ path: "$.Access2" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0]!)).toMatchObject({
      msg: "logged",
      component: "root",
      path: "$.Access2",
    })
  })

  it("serializes errors with their code and cause", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    const err = new MalformedValueError({ expected: "string", actual: "number" })
    logger.error("deserialize failed", { err })

    const payload = JSON.parse(lines[0]!)

    expect(payload.err).toMatchObject({
      type: "MalformedValueError",
      message: "Expected string but found number",
      code: "malformed_value",
    })
  })
})
