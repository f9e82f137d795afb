import { FakeClock } from "@logsmith/clock"
import { FIXED_INSTANT, makeRecord } from "../../../tests/utils/records"
import {
  escapeParamValue,
  formatRfc5424,
  formatStructuredData,
  formatSyslogTimestamp,
  resolveHostname,
} from "../rfc5424"

describe("formatRfc5424", () => {
  const utc = new FakeClock(FIXED_INSTANT, 0)

  it("renders every header field", () => {
    const line = formatRfc5424(makeRecord(), {
      clock: utc,
      hostname: "host1",
      appName: "billing",
      message: "2024-01-15 10:30:00 - app - INFO - hello",
    })

    expect(line).toBe(
      "1 2024-01-15T10:30:00.042Z host1 billing 4242 - - 2024-01-15 10:30:00 - app - INFO - hello",
    )
  })

  it("uses the nil value for missing app name, hostname and pid", () => {
    const { processInfo: _omit, ...record } = makeRecord()

    expect(formatRfc5424(record, { clock: utc, hostname: "", message: "m" })).toBe(
      "1 2024-01-15T10:30:00.042Z - - - - - m",
    )
  })

  it("places structured data before the message", () => {
    const record = makeRecord({
      structuredData: {
        "user1@host1": { key1: "value1", key2: "value2" },
        "some@thing": { key3: "value3" },
      },
    })

    expect(formatRfc5424(record, { clock: utc, hostname: "h", message: "m" })).toBe(
      '1 2024-01-15T10:30:00.042Z h - 4242 - [user1@host1 key1="value1" key2="value2"][some@thing key3="value3"] m',
    )
  })
})

describe("formatSyslogTimestamp", () => {
  const at = new Date(FIXED_INSTANT)

  it("ends in Z at offset zero", () => {
    expect(formatSyslogTimestamp(at, new FakeClock(0, 0))).toBe("2024-01-15T10:30:00.042Z")
  })

  it("shows local wall time with a positive offset", () => {
    expect(formatSyslogTimestamp(at, new FakeClock(0, 60))).toBe("2024-01-15T11:30:00.042+01:00")
  })

  it("shows local wall time with a negative offset", () => {
    expect(formatSyslogTimestamp(at, new FakeClock(0, -300))).toBe("2024-01-15T05:30:00.042-05:00")
  })
})

describe("formatStructuredData", () => {
  it("escapes quote, backslash and closing bracket in values", () => {
    expect(formatStructuredData({ "a@1": { k: 'v"esc' } })).toBe('[a@1 k="v\\"esc"]')
    expect(escapeParamValue("a]b\\c")).toBe("a\\]b\\\\c")
  })

  it("stringifies non-string values", () => {
    expect(formatStructuredData({ "m@1": { n: 3, ok: true } })).toBe('[m@1 n="3" ok="true"]')
  })

  it("renders the nil value when absent or empty", () => {
    expect(formatStructuredData(undefined)).toBe("-")
    expect(formatStructuredData({})).toBe("-")
  })

  it("renders an element with no params as the bare id", () => {
    expect(formatStructuredData({ "x@1": {} })).toBe("[x@1]")
  })
})

describe("resolveHostname", () => {
  it("returns the looked-up name", () => {
    expect(resolveHostname(() => "box")).toBe("box")
  })

  it("falls back to the nil value when lookup throws", () => {
    expect(
      resolveHostname(() => {
        throw new Error("no hostname")
      }),
    ).toBe("-")
  })
})
