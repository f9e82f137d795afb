import type { TimeSource } from "@logsmith/clock"
import { describeErrorChain } from "@logsmith/errors"
import type { CanonicalLevel } from "../../ports/log-level"
import type { LogRecord } from "../../ports/log-record"
import type { TimeZoneStyle } from "../../ports/time-zone"
import { colorize, type LevelColors } from "./colors"
import { formatDateTime, formatMillis, offsetFor, wallClock } from "./timestamp"

/**
 * - compact: `2024-01-15 10:30:00 - app - INFO - message`
 * - verbose: `2024-01-15 10:30:00,042 - app - DEBUG - <PID 4242:node> - worker:run:17 - message`
 */
export type LinePattern = "compact" | "verbose"

/** DEBUG sinks get the verbose pattern; everything else stays compact. */
export function patternFor(level: CanonicalLevel): LinePattern {
  return level === "DEBUG" ? "verbose" : "compact"
}

export type LineFormatterOptions = {
  pattern: LinePattern
  timeZone: TimeZoneStyle

  /** Wrap each line in its level's ANSI color. Console sinks only. */
  colors?: LevelColors
}

const UNKNOWN = "?"

export class LineFormatter {
  constructor(
    private readonly clock: TimeSource,
    private readonly options: LineFormatterOptions,
  ) {}

  get verbose(): boolean {
    return this.options.pattern === "verbose"
  }

  /** The line without color and without exception text. */
  formatBase(record: LogRecord): string {
    const wall = wallClock(record.timestamp, offsetFor(record.timestamp, this.options.timeZone, this.clock))
    const asctime = formatDateTime(wall)
    const head = `${record.loggerName} - ${record.level}`

    if (!this.verbose) {
      return `${asctime} - ${head} - ${record.message}`
    }

    const pid = record.processInfo?.pid ?? UNKNOWN
    const processName = record.processInfo?.processName ?? UNKNOWN
    const src = record.sourceLocation
    const where = `${src?.module ?? UNKNOWN}:${src?.function ?? UNKNOWN}:${src?.line ?? UNKNOWN}`

    return `${asctime},${formatMillis(wall)} - ${head} - <PID ${pid}:${processName}> - ${where} - ${record.message}`
  }

  /** The full rendering: colored base line followed by the exception chain, if any. */
  format(record: LogRecord): string {
    const base = this.formatBase(record)
    const line = this.options.colors ? colorize(base, record.level, this.options.colors) : base

    if (record.error === undefined) return line

    return [line, ...describeErrorChain(record.error)].join("\n")
  }
}
