import type { SinkConstructionError } from "../core/errors"
import type { CanonicalLevel } from "./log-level"
import type { LogRecord } from "./log-record"

export type SinkKind = "console" | "file" | "mail" | "syslog"

/**
 * A configured destination for log records.
 *
 * @remarks
 * `write` runs synchronously and throws on I/O failure; sinks that transmit
 * asynchronously hold the outcome until `flush`.
 */
export interface Sink {
  readonly kind: SinkKind

  /** Records below this level are not handed to the sink. */
  readonly level: CanonicalLevel

  /** Whether rendered lines carry pid, module, function and line number. */
  readonly verbose: boolean

  write(record: LogRecord): void

  /** Push out anything buffered and report failures accumulated since the last flush. */
  flush(): Promise<void>

  /** Flush, then release files and sockets. Later writes are dropped. */
  close(): Promise<void>
}

export type SinkOpened<S extends Sink> = { ok: true; sink: S }
export type SinkFailed = { ok: false; error: SinkConstructionError }

/** Outcome of opening a sink. Constructors never fall back on their own. */
export type SinkResult<S extends Sink> = SinkOpened<S> | SinkFailed
