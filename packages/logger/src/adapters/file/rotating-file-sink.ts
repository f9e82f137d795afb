import * as fs from "node:fs"
import * as path from "node:path"
import { SystemClock, type TimeSource } from "@logsmith/clock"
import { SinkConstructionError } from "../../core/errors"
import { LineFormatter, patternFor } from "../../core/format/line-formatter"
import type { Diagnostics } from "../../ports/diagnostics"
import type { CanonicalLevel } from "../../ports/log-level"
import type { LogRecord } from "../../ports/log-record"
import type { Sink, SinkResult } from "../../ports/sink"
import type { TimeZoneStyle } from "../../ports/time-zone"
import { defaultDiagnostics } from "../diagnostics/pino-diagnostics"
import { archivePath, compressFile, unlinkIfExists } from "./archive"

export type RotatingFileSinkOptions = {
  path: string
  level: CanonicalLevel
  timeZone: TimeZoneStyle

  /** Roll over before a write would reach this size. `0` never rolls over. */
  maxBytes: number

  /** Compressed archives to keep; `<path>.1.gz` is the newest. */
  backupCount: number

  encoding: BufferEncoding

  /**
   * Open the file on first write instead of at construction, and again after
   * each rollover.
   * @default false
   */
  lazy?: boolean
}

export type RotatingFileSinkDeps = {
  clock?: TimeSource
  diagnostics?: Diagnostics
}

type RotationState = {
  fd: number | undefined
  currentSize: number
}

/**
 * Appends formatted lines to a file and rotates it into gzip archives.
 *
 * @remarks
 * All file-system calls are synchronous. A rollover therefore completes before
 * any other write is looked at, and I/O errors surface from `write`.
 */
export class RotatingFileSink implements Sink {
  readonly kind = "file"
  readonly level: CanonicalLevel

  private readonly options: Readonly<RotatingFileSinkOptions>
  private readonly formatter: LineFormatter
  private readonly state: RotationState = { fd: undefined, currentSize: 0 }
  private closed = false

  /** Throws when the file cannot be opened. Prefer {@link openRotatingFileSink}. */
  constructor(options: RotatingFileSinkOptions, deps: RotatingFileSinkDeps = {}) {
    this.options = Object.freeze({ ...options })
    this.level = options.level
    this.formatter = new LineFormatter(deps.clock ?? new SystemClock(), {
      pattern: patternFor(options.level),
      timeZone: options.timeZone,
    })

    if (!fs.existsSync(options.path)) {
      const diagnostics = deps.diagnostics ?? defaultDiagnostics()
      diagnostics.warn("Logfile doesn't exist and will be created", { path: options.path })
    }

    if (options.lazy) assertWritable(options.path)
    else this.open()
  }

  get verbose(): boolean {
    return this.formatter.verbose
  }

  get path(): string {
    return this.options.path
  }

  write(record: LogRecord): void {
    if (this.closed) return

    const data = Buffer.from(`${this.formatter.format(record)}\n`, this.options.encoding)

    if (this.state.fd === undefined) this.open()
    if (this.shouldRollover(data.length)) this.rollover()

    fs.writeSync(this.ensureOpen(), data)
    this.state.currentSize += data.length
  }

  /**
   * Shift archives up by one, compress the active file into `<path>.1.gz`
   * and start a new active file. The oldest archive falls off the end.
   */
  rollover(): void {
    const base = this.options.path
    this.closeFd()

    for (let i = this.options.backupCount - 1; i >= 1; i--) {
      const src = archivePath(base, i)
      if (!fs.existsSync(src)) continue

      unlinkIfExists(archivePath(base, i + 1))
      fs.renameSync(src, archivePath(base, i + 1))
    }

    const rotated = `${base}.1`
    unlinkIfExists(rotated)

    if (fs.existsSync(base)) {
      fs.renameSync(base, rotated)
      compressFile(rotated, archivePath(base, 1))
      fs.unlinkSync(rotated)
    }

    this.state.currentSize = 0
    if (!this.options.lazy) this.open()
  }

  async flush(): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true
    this.closeFd()
  }

  /** An empty active file is never rotated, however large the incoming line. */
  private shouldRollover(incoming: number): boolean {
    if (this.options.maxBytes <= 0 || this.state.currentSize === 0) return false

    return this.state.currentSize + incoming >= this.options.maxBytes
  }

  private open(): number {
    const fd = fs.openSync(this.options.path, "a")
    this.state.fd = fd
    this.state.currentSize = fs.fstatSync(fd).size

    return fd
  }

  private ensureOpen(): number {
    return this.state.fd ?? this.open()
  }

  private closeFd(): void {
    if (this.state.fd === undefined) return

    fs.closeSync(this.state.fd)
    this.state.fd = undefined
  }
}

/** Throws unless `file`, or its directory when `file` is missing, is writable. */
function assertWritable(file: string): void {
  const target = fs.existsSync(file) ? file : path.dirname(file)
  fs.accessSync(target, fs.constants.W_OK)
}

export function openRotatingFileSink(
  options: RotatingFileSinkOptions,
  deps: RotatingFileSinkDeps = {},
): SinkResult<RotatingFileSink> {
  if (options.path.trim() === "") {
    return {
      ok: false,
      error: new SinkConstructionError("file", "Log file path is empty"),
    }
  }

  try {
    return { ok: true, sink: new RotatingFileSink(options, deps) }
  } catch (err) {
    return {
      ok: false,
      error: new SinkConstructionError("file", `Log file ${options.path} could not be opened`, {
        cause: err,
        context: { path: options.path },
      }),
    }
  }
}
