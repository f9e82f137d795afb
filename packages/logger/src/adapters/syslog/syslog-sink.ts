import { lookup } from "node:dns/promises"
import { SystemClock, type TimeSource } from "@logsmith/clock"
import { SinkConstructionError } from "../../core/errors"
import { LineFormatter, patternFor } from "../../core/format/line-formatter"
import { frameSyslogMessage, type SyslogFacility } from "../../core/syslog/priority"
import { formatRfc5424, resolveHostname } from "../../core/syslog/rfc5424"
import type { Diagnostics } from "../../ports/diagnostics"
import type { CanonicalLevel } from "../../ports/log-level"
import type { LogRecord } from "../../ports/log-record"
import type { Sink, SinkResult } from "../../ports/sink"
import type { TimeZoneStyle } from "../../ports/time-zone"
import { defaultDiagnostics } from "../diagnostics/pino-diagnostics"
import { createSyslogSocket } from "./create-socket"
import type { SyslogSocket, SyslogSocketFactory, SyslogTransport } from "./socket"

export type SyslogSinkOptions = {
  host: string
  port: number
  level: CanonicalLevel
  timeZone: TimeZoneStyle

  /** @default "udp" */
  transport?: SyslogTransport

  /** APP-NAME field; `-` when omitted. */
  appName?: string

  /** @default "user" */
  facility?: SyslogFacility
}

export type SyslogSinkDeps = {
  socket: SyslogSocket

  /** HOSTNAME field, resolved once. */
  hostname: string
  clock?: TimeSource
}

/**
 * Sends each record as `<PRI>` + RFC 5424 line + NUL.
 *
 * @remarks
 * Delivery is best-effort. `flush` has nothing to wait for.
 */
export class SyslogSink implements Sink {
  readonly kind = "syslog"
  readonly level: CanonicalLevel

  private readonly options: Readonly<SyslogSinkOptions>
  private readonly formatter: LineFormatter
  private readonly clock: TimeSource
  private closed = false

  constructor(
    options: SyslogSinkOptions,
    private readonly deps: SyslogSinkDeps,
  ) {
    this.options = Object.freeze({ ...options })
    this.level = options.level
    this.clock = deps.clock ?? new SystemClock()
    this.formatter = new LineFormatter(this.clock, {
      pattern: patternFor(options.level),
      timeZone: options.timeZone,
    })
  }

  get verbose(): boolean {
    return this.formatter.verbose
  }

  /** The RFC 5424 line for a record, without framing. */
  render(record: LogRecord): string {
    return formatRfc5424(record, {
      clock: this.clock,
      hostname: this.deps.hostname,
      message: this.formatter.format(record),
      ...(this.options.appName !== undefined && { appName: this.options.appName }),
    })
  }

  write(record: LogRecord): void {
    if (this.closed) return

    const frame = frameSyslogMessage(this.render(record), record.level, this.options.facility)
    this.deps.socket.send(frame)
  }

  async flush(): Promise<void> {}

  async close(): Promise<void> {
    if (this.closed) return

    this.closed = true
    await this.deps.socket.close()
  }
}

export type OpenSyslogSinkDeps = {
  clock?: TimeSource
  diagnostics?: Diagnostics
  createSocket?: SyslogSocketFactory
  resolveAddress?: (host: string) => Promise<string>
  hostname?: () => string
}

async function lookupAddress(host: string): Promise<string> {
  const { address } = await lookup(host)
  return address
}

/**
 * Resolve the collector, open the socket and build the sink. TCP connects here,
 * so an unreachable collector is reported now rather than on first write.
 */
export async function openSyslogSink(
  options: SyslogSinkOptions,
  deps: OpenSyslogSinkDeps = {},
): Promise<SinkResult<SyslogSink>> {
  if (options.host.trim() === "") {
    return { ok: false, error: new SinkConstructionError("syslog", "Syslog host is empty") }
  }

  const diagnostics = deps.diagnostics ?? defaultDiagnostics()
  const transport = options.transport ?? "udp"

  try {
    const address = await (deps.resolveAddress ?? lookupAddress)(options.host)
    const socket = await (deps.createSocket ?? createSyslogSocket)(
      { address, port: options.port, transport },
      (err) => diagnostics.error("Syslog message could not be sent", { err, host: options.host }),
    )

    const sink = new SyslogSink(options, {
      socket,
      hostname: resolveHostname(deps.hostname),
      ...(deps.clock && { clock: deps.clock }),
    })

    return { ok: true, sink }
  } catch (err) {
    return {
      ok: false,
      error: new SinkConstructionError(
        "syslog",
        `Syslog server ${options.host}:${options.port} is unavailable`,
        { cause: err, context: { host: options.host, port: options.port, transport } },
      ),
    }
  }
}
