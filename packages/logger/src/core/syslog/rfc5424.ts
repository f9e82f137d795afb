import os from "node:os"
import type { TimeSource } from "@logsmith/clock"
import type { LogRecord, StructuredData } from "../../ports/log-record"
import { formatUtcOffset, pad, wallClock } from "../format/timestamp"

export const SYSLOG_VERSION = 1
export const NILVALUE = "-"

const ESCAPED = /([\]"\\])/g

export type Rfc5424Options = {
  clock: TimeSource
  /** The MSG part, already rendered by the sink's line formatter. */
  message: string
  appName?: string
  /** Resolved once per sink; `-` when resolution failed. */
  hostname: string
}

/**
 * `VERSION TIMESTAMP HOSTNAME APPNAME PROCID MSGID STRUCTURED-DATA MSG`
 *
 * MSGID is always the nil value.
 */
export function formatRfc5424(record: LogRecord, opts: Rfc5424Options): string {
  const fields = [
    SYSLOG_VERSION,
    formatSyslogTimestamp(record.timestamp, opts.clock),
    opts.hostname || NILVALUE,
    opts.appName || NILVALUE,
    record.processInfo?.pid ?? NILVALUE,
    NILVALUE,
    formatStructuredData(record.structuredData),
    opts.message,
  ]

  return fields.join(" ")
}

/** Local wall time with milliseconds, then `Z` or `±HH:MM`. */
export function formatSyslogTimestamp(at: Date, clock: TimeSource): string {
  const offset = clock.utcOffsetMinutes(at)
  const wall = wallClock(at, offset)

  const date = `${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)}`
  const time = `${pad(wall.hour)}:${pad(wall.minute)}:${pad(wall.second)}.${pad(wall.millisecond, 3)}`

  return `${date}T${time}${formatUtcOffset(offset)}`
}

/**
 * `[id k="v" ...]` per SD-ID, no separator between elements.
 *
 * Only values are escaped. SD-IDs and param names are emitted as given, so an
 * ID containing a space or `]` produces a malformed frame.
 */
export function formatStructuredData(data: StructuredData | undefined): string {
  if (!data) return NILVALUE

  const elements = Object.entries(data).map(([sdId, params]) => {
    const pairs = Object.entries(params).map(([name, value]) => ` ${name}="${escapeParamValue(value)}"`)
    return `[${sdId}${pairs.join("")}]`
  })

  return elements.length > 0 ? elements.join("") : NILVALUE
}

export function escapeParamValue(value: unknown): string {
  return String(value).replace(ESCAPED, "\\$1")
}

export function resolveHostname(lookup: () => string = os.hostname): string {
  try {
    return lookup() || NILVALUE
  } catch {
    return NILVALUE
  }
}
