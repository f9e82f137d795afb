import { SystemClock, type TimeSource } from "@logsmith/clock"
import { DEFAULT_COLORS, type LevelColors } from "../../core/format/colors"
import { LineFormatter, patternFor } from "../../core/format/line-formatter"
import type { CanonicalLevel } from "../../ports/log-level"
import type { LogRecord } from "../../ports/log-record"
import type { Sink } from "../../ports/sink"
import type { TimeZoneStyle } from "../../ports/time-zone"

export type ConsoleWriter = Pick<Console, "debug" | "info" | "warn" | "error">

export type ConsoleSinkDeps = {
  console?: ConsoleWriter
  clock?: TimeSource
}

export type ConsoleSinkOptions = {
  level: CanonicalLevel
  timeZone: TimeZoneStyle

  /**
   * Level colors, or `false` for plain lines.
   * @default DEFAULT_COLORS
   */
  colors?: LevelColors | false
}

type ConsoleMethod = keyof ConsoleWriter

const LEVEL_TO_CONSOLE_METHOD: Record<CanonicalLevel, ConsoleMethod> = {
  DEBUG: "debug",
  INFO: "info",
  WARNING: "warn",
  ERROR: "error",
  CRITICAL: "error",
}

export class ConsoleSink implements Sink {
  readonly kind = "console"
  readonly level: CanonicalLevel

  private readonly out: ConsoleWriter
  private readonly formatter: LineFormatter
  private closed = false

  constructor(options: ConsoleSinkOptions, deps: ConsoleSinkDeps = {}) {
    this.level = options.level
    this.out = deps.console ?? globalThis.console

    const colors = options.colors === false ? undefined : (options.colors ?? DEFAULT_COLORS)
    this.formatter = new LineFormatter(deps.clock ?? new SystemClock(), {
      pattern: patternFor(options.level),
      timeZone: options.timeZone,
      ...(colors && { colors }),
    })
  }

  get verbose(): boolean {
    return this.formatter.verbose
  }

  write(record: LogRecord): void {
    if (this.closed) return

    this.out[LEVEL_TO_CONSOLE_METHOD[record.level]](this.formatter.format(record))
  }

  async flush(): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true
  }
}
