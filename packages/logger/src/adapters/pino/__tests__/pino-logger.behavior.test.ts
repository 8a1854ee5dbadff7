import { Writable } from "node:stream"
import { describe, expect, it } from "vitest"

import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = String(chunk).trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("writes JSON lines with bindings and meta", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ level: "trace", destination }, { module: "options" })

    logger.info("Loading options from /srv/app.json", { file: "/srv/app.json" })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload).toMatchObject({
      msg: "Loading options from /srv/app.json",
      module: "options",
      file: "/srv/app.json",
      level: 30,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ level: "trace", destination })

    logger.error("write failed", {
      err: new Error("outer", { cause: new Error("disk full") }),
    })

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload.err.message).toBe("outer")
    expect(payload.err.type).toBe("Error")
    expect(payload.err.cause.message).toBe("disk full")
  })

  it("child() shares the parent sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ level: "warn", destination }, { module: "options" })
    const child = base.child({ operation: "write" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      msg: "logged",
      module: "options",
      operation: "write",
    })
  })
})
