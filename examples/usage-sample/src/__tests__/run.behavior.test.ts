import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { FakeClock } from "@logsmith/clock"
import type { MailTransport } from "@logsmith/email"
import { type ConsoleWriter, MemoryDiagnostics } from "@logsmith/logger"
import { mock } from "vitest-mock-extended"
import { argvOverrides } from "../load-sample-config"
import { run } from "../run"

function recordingConsole() {
  const lines: string[] = []
  const push = (line: string): void => {
    lines.push(line)
  }
  const writer: ConsoleWriter = { debug: push, info: push, warn: push, error: push }

  return { writer, lines }
}

describe("usage sample", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "logsmith-sample-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("maps command-line flags onto configuration keys", () => {
    expect(argvOverrides(["--level", "debug", "--utc"])).toEqual({ LOG_LEVEL: "debug", LOG_TIME_ZONE: "utc" })
    expect(argvOverrides([])).toEqual({})
  })

  it("logs to the console and the configured file, then shuts down", async () => {
    const logFile = path.join(cwd, "app.log")
    await fs.writeFile(path.join(cwd, ".env"), "LOG_LEVEL=error\n")
    const { writer, lines } = recordingConsole()

    const result = await run({
      env: { LOG_LEVEL: "warning", LOG_FILE: logFile },
      argv: ["--utc"],
      cwd,
      deps: {
        clock: new FakeClock(Date.UTC(2024, 0, 15, 10, 30, 0)),
        console: writer,
        diagnostics: new MemoryDiagnostics(),
      },
    })

    expect(result).toEqual({ ok: true, failures: [] })
    expect(lines).toEqual([
      "\x1b[33;20m2024-01-15 10:30:00 - root - WARNING - warn message\x1b[0m",
      "\x1b[31;20m2024-01-15 10:30:00 - root - ERROR - error message\x1b[0m",
      "\x1b[31;1m2024-01-15 10:30:00 - root - CRITICAL - critical message\x1b[0m",
    ])
    expect(await fs.readFile(logFile, "utf8")).toBe(
      [
        "2024-01-15 10:30:00 - File - WARNING - warn message",
        "2024-01-15 10:30:00 - File - ERROR - error message",
        "2024-01-15 10:30:00 - File - CRITICAL - critical message",
        "",
      ].join("\n"),
    )
  })

  it("reports an undelivered digest and still shuts down", async () => {
    const transport = mock<MailTransport>()
    transport.send.mockRejectedValue(new Error("relay refused"))
    const diagnostics = new MemoryDiagnostics()
    const { writer } = recordingConsole()

    const result = await run({
      env: { SMTP_HOST: "smtp.test", SMTP_FROM: "app@example.test", SMTP_TO: "ops@example.test" },
      cwd,
      deps: { console: writer, diagnostics, transport },
    })

    expect(result).toEqual({ ok: true, failures: [] })
    expect(transport.send).toHaveBeenCalledTimes(1)
    expect(transport.close).toHaveBeenCalledTimes(1)
    expect(diagnostics.messages()).toEqual(["Log digest could not be sent", "Sample digest was not delivered"])
  })
})
