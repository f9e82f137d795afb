import { FakeClock } from "@logsmith/clock"
import { FIXED_INSTANT, makeRecord } from "../../../tests/utils/records"
import { FakeSyslogSocket, fakeSocketFactory } from "../../../tests/utils/fake-syslog-socket"
import { MemoryDiagnostics } from "../../diagnostics/memory-diagnostics"
import { openSyslogSink, SyslogSink, type SyslogSinkOptions } from "../syslog-sink"

const baseOptions: SyslogSinkOptions = {
  host: "collector.test",
  port: 1514,
  level: "INFO",
  timeZone: "utc",
  appName: "billing",
}

describe("SyslogSink behavior", () => {
  function open(overrides: Partial<SyslogSinkOptions> = {}, offsetMinutes = 0) {
    const socket = new FakeSyslogSocket()
    const sink = new SyslogSink(
      { ...baseOptions, ...overrides },
      { socket, hostname: "web-1", clock: new FakeClock(FIXED_INSTANT, offsetMinutes) },
    )
    return { sink, socket }
  }

  it("sends <PRI>, the RFC 5424 line and a NUL", () => {
    const { sink, socket } = open()

    sink.write(makeRecord({ level: "ERROR", message: "Message" }))

    expect(socket.texts()).toEqual([
      "<11>1 2024-01-15T10:30:00.042Z web-1 billing 4242 - - 2024-01-15 10:30:00 - app - ERROR - Message\u0000",
    ])
  })

  it("renders structured data with escaped values", () => {
    const { sink } = open()

    const line = sink.render(
      makeRecord({ structuredData: { "a@1": { k: 'v"esc' } }, message: "m" }),
    )

    expect(line).toBe(
      '1 2024-01-15T10:30:00.042Z web-1 billing 4242 - [a@1 k="v\\"esc"] 2024-01-15 10:30:00 - app - INFO - m',
    )
  })

  it("stamps the header with the local offset", () => {
    const { sink } = open({ timeZone: "local" }, 60)

    expect(sink.render(makeRecord({ message: "m" }))).toBe(
      "1 2024-01-15T11:30:00.042+01:00 web-1 billing 4242 - - 2024-01-15 11:30:00 - app - INFO - m",
    )
  })

  it("uses the configured facility", () => {
    const { sink, socket } = open({ facility: "local0" })

    sink.write(makeRecord({ level: "INFO" }))

    expect(socket.texts()[0]?.startsWith("<134>1 ")).toBe(true)
  })

  it("close() closes the socket", async () => {
    const { sink, socket } = open()

    await sink.close()

    expect(socket.closed).toBe(true)
  })
})

describe("openSyslogSink", () => {
  it("resolves the host and opens a UDP socket by default", async () => {
    const { factory, opened } = fakeSocketFactory()

    const result = await openSyslogSink(baseOptions, {
      createSocket: factory,
      resolveAddress: async () => "192.0.2.10",
      hostname: () => "web-1",
      diagnostics: new MemoryDiagnostics(),
    })

    expect(result.ok).toBe(true)
    expect(opened).toEqual([{ address: "192.0.2.10", port: 1514, transport: "udp" }])
  })

  it("passes the TCP transport through", async () => {
    const { factory, opened } = fakeSocketFactory()

    await openSyslogSink(
      { ...baseOptions, transport: "tcp" },
      { createSocket: factory, resolveAddress: async () => "192.0.2.10" },
    )

    expect(opened[0]?.transport).toBe("tcp")
  })

  it("uses the nil hostname when the lookup fails", async () => {
    const { factory, socket } = fakeSocketFactory()

    const result = await openSyslogSink(baseOptions, {
      createSocket: factory,
      resolveAddress: async () => "192.0.2.10",
      hostname: () => {
        throw new Error("EPERM")
      },
    })

    if (!result.ok) throw result.error
    result.sink.write(makeRecord())

    expect(socket.texts()[0]?.split(" ")[2]).toBe("-")
  })

  it("reports send errors after opening to diagnostics", async () => {
    const { factory, errorHandlers } = fakeSocketFactory()
    const diagnostics = new MemoryDiagnostics()

    await openSyslogSink(baseOptions, {
      createSocket: factory,
      resolveAddress: async () => "192.0.2.10",
      diagnostics,
    })

    const err = new Error("EHOSTUNREACH")
    errorHandlers[0]?.(err)

    expect(diagnostics.entries).toEqual([
      {
        level: "error",
        message: "Syslog message could not be sent",
        meta: { err, host: "collector.test" },
      },
    ])
  })

  it("fails for an empty host", async () => {
    const result = await openSyslogSink({ ...baseOptions, host: "" })

    expect(result.ok).toBe(false)
    expect(!result.ok && result.error.message).toBe("Syslog host is empty")
  })

  it("fails when the host does not resolve", async () => {
    const lookupError = new Error("getaddrinfo ENOTFOUND collector.test")

    const result = await openSyslogSink(baseOptions, {
      resolveAddress: async () => {
        throw lookupError
      },
      diagnostics: new MemoryDiagnostics(),
    })

    expect(result.ok).toBe(false)
    expect(!result.ok && result.error).toMatchObject({
      code: "sink_construction_failed",
      sink: "syslog",
      message: "Syslog server collector.test:1514 is unavailable",
      cause: lookupError,
    })
  })

  it("fails when the TCP connection is refused", async () => {
    const refused = new Error("connect ECONNREFUSED 192.0.2.10:1514")

    const result = await openSyslogSink(
      { ...baseOptions, transport: "tcp" },
      {
        resolveAddress: async () => "192.0.2.10",
        createSocket: async () => {
          throw refused
        },
      },
    )

    expect(!result.ok && result.error.cause).toBe(refused)
    expect(!result.ok && result.error.context).toEqual({
      sink: "syslog",
      host: "collector.test",
      port: 1514,
      transport: "tcp",
    })
  })
})
