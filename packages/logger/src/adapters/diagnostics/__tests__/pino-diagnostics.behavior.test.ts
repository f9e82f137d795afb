import { Writable } from "node:stream"
import { PinoDiagnostics } from "../pino-diagnostics"

function makeLineDestination() {
  const lines: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(JSON.parse(line))
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoDiagnostics behavior", () => {
  it("writes warnings as JSON with the library name", () => {
    const { lines, destination } = makeLineDestination()
    const diagnostics = new PinoDiagnostics({ destination })

    diagnostics.warn("Couldn't parse inputted loglevel, using default INFO", { input: "LOUD" })

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      level: 40,
      name: "logsmith",
      msg: "Couldn't parse inputted loglevel, using default INFO",
      input: "LOUD",
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()
    const diagnostics = new PinoDiagnostics({ destination })

    diagnostics.error("Log digest could not be sent", {
      err: new Error("outer", { cause: new Error("inner") }),
    })

    expect(lines[0]).toMatchObject({
      level: 50,
      err: { type: "Error", message: "outer", cause: { type: "Error", message: "inner" } },
    })
  })
})
