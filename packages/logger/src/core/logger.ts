import { SystemClock, type TimeSource } from "@logsmith/clock"
import { type CanonicalLevel, isLevelEnabled } from "../ports/log-level"
import type { LogMeta, LogRecord, ProcessInfo } from "../ports/log-record"
import type { Sink } from "../ports/sink"
import { captureSourceLocation } from "./format/source-location"

export type LoggerDeps = {
  clock?: TimeSource
  processInfo?: () => ProcessInfo
}

export function currentProcessInfo(): ProcessInfo {
  return { pid: process.pid, processName: process.title }
}

/**
 * A named entry point that fans records out to its sinks.
 *
 * @remarks
 * Each sink filters by its own level; the logger has none. A record is built
 * only when at least one sink admits it.
 */
export class Logger {
  private readonly sinks: Sink[] = []
  private readonly clock: TimeSource
  private readonly processInfo: () => ProcessInfo

  constructor(
    readonly name: string,
    deps: LoggerDeps = {},
  ) {
    this.clock = deps.clock ?? new SystemClock()
    this.processInfo = deps.processInfo ?? currentProcessInfo
  }

  addSink(sink: Sink): this {
    if (!this.sinks.includes(sink)) this.sinks.push(sink)
    return this
  }

  removeSink(sink: Sink): boolean {
    const index = this.sinks.indexOf(sink)
    if (index === -1) return false

    this.sinks.splice(index, 1)
    return true
  }

  getSinks(): readonly Sink[] {
    return [...this.sinks]
  }

  isEnabledFor(level: CanonicalLevel): boolean {
    return this.sinks.some((s) => isLevelEnabled(level, s.level))
  }

  debug(message: string, meta?: LogMeta): void {
    this.emit("DEBUG", message, meta, this.debug)
  }

  info(message: string, meta?: LogMeta): void {
    this.emit("INFO", message, meta, this.info)
  }

  warning(message: string, meta?: LogMeta): void {
    this.emit("WARNING", message, meta, this.warning)
  }

  error(message: string, meta?: LogMeta): void {
    this.emit("ERROR", message, meta, this.error)
  }

  critical(message: string, meta?: LogMeta): void {
    this.emit("CRITICAL", message, meta, this.critical)
  }

  log(level: CanonicalLevel, message: string, meta?: LogMeta): void {
    this.emit(level, message, meta, this.log)
  }

  /**
   * Write to every admitting sink, then rethrow: the error itself when one
   * sink failed, an AggregateError when several did.
   */
  private emit(
    level: CanonicalLevel,
    message: string,
    meta: LogMeta | undefined,
    entry: (...args: never[]) => unknown,
  ): void {
    const targets = this.sinks.filter((s) => isLevelEnabled(level, s.level))
    if (targets.length === 0) return

    const record = this.buildRecord(level, message, meta, targets.some((s) => s.verbose) ? entry : undefined)

    const errors: unknown[] = []
    for (const sink of targets) {
      try {
        sink.write(record)
      } catch (err) {
        errors.push(err)
      }
    }

    if (errors.length === 1) throw errors[0]
    if (errors.length > 1) {
      throw new AggregateError(errors, `${errors.length} sinks of logger ${this.name} failed`)
    }
  }

  private buildRecord(
    level: CanonicalLevel,
    message: string,
    meta: LogMeta | undefined,
    captureFrom: ((...args: never[]) => unknown) | undefined,
  ): LogRecord {
    const sourceLocation = captureFrom && captureSourceLocation(captureFrom)

    return Object.freeze({
      timestamp: this.clock.now(),
      level,
      loggerName: this.name,
      message,
      processInfo: this.processInfo(),
      ...(sourceLocation && { sourceLocation }),
      ...(meta?.structuredData && { structuredData: meta.structuredData }),
      ...(meta?.err !== undefined && { error: meta.err }),
    })
  }
}
