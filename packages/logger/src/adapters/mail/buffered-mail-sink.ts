import { SystemClock, type TimeSource } from "@logsmith/clock"
import {
  createSmtpTransport,
  type MailMessage,
  type MailRecipients,
  type MailTransport,
  toRecipientList,
} from "@logsmith/email"
import { SinkConstructionError, TransmissionError } from "../../core/errors"
import { LineFormatter, patternFor } from "../../core/format/line-formatter"
import type { Diagnostics } from "../../ports/diagnostics"
import type { CanonicalLevel } from "../../ports/log-level"
import type { LogRecord } from "../../ports/log-record"
import type { Sink, SinkResult } from "../../ports/sink"
import type { TimeZoneStyle } from "../../ports/time-zone"
import { defaultDiagnostics } from "../diagnostics/pino-diagnostics"

export type SmtpServerOptions = {
  host: string
  port: number
  username?: string
  password?: string
}

export type BufferedMailSinkOptions = {
  level: CanonicalLevel
  timeZone: TimeZoneStyle

  /** Records held before an automatic send. */
  capacity: number

  from: string
  to: MailRecipients
  subject: string
}

export type BufferedMailSinkDeps = {
  transport: MailTransport
  clock?: TimeSource
  diagnostics?: Diagnostics
}

export const LINE_TERMINATOR = "\r\n"

/**
 * Collects records and mails them as one plain-text digest.
 *
 * @remarks
 * Appending and swapping out a full buffer happen synchronously inside `write`;
 * only the SMTP session runs in the background. A batch is taken out of the
 * buffer before it is sent and is not retried if the send fails.
 */
export class BufferedMailSink implements Sink {
  readonly kind = "mail"
  readonly level: CanonicalLevel

  private readonly options: Readonly<BufferedMailSinkOptions>
  private readonly formatter: LineFormatter
  private readonly diagnostics: Diagnostics

  private buffer: LogRecord[] = []
  private readonly inFlight = new Set<Promise<void>>()
  private readonly failures: unknown[] = []
  private closed = false

  constructor(
    options: BufferedMailSinkOptions,
    private readonly deps: BufferedMailSinkDeps,
  ) {
    this.options = Object.freeze({ ...options })
    this.level = options.level
    this.diagnostics = deps.diagnostics ?? defaultDiagnostics()
    this.formatter = new LineFormatter(deps.clock ?? new SystemClock(), {
      pattern: patternFor(options.level),
      timeZone: options.timeZone,
    })
  }

  get verbose(): boolean {
    return this.formatter.verbose
  }

  /** Records waiting for the next send. */
  get buffered(): number {
    return this.buffer.length
  }

  write(record: LogRecord): void {
    if (this.closed) return

    this.buffer.push(record)
    if (this.buffer.length >= this.options.capacity) this.dispatch()
  }

  /**
   * Send whatever is buffered and wait for every send started so far.
   *
   * @throws TransmissionError when any send since the previous flush failed.
   */
  async flush(): Promise<void> {
    if (this.buffer.length > 0) this.dispatch()

    await Promise.all([...this.inFlight])

    const failures = this.failures.splice(0)
    if (failures.length === 0) return

    throw new TransmissionError(`${failures.length} log digest(s) could not be sent`, {
      cause: failures.length === 1 ? failures[0] : new AggregateError(failures),
      context: { failed: failures.length },
    })
  }

  async close(): Promise<void> {
    if (this.closed) return

    try {
      await this.flush()
    } finally {
      this.closed = true
      this.deps.transport.close()
    }
  }

  /** The digest a batch turns into. */
  compose(batch: readonly LogRecord[]): MailMessage {
    return {
      from: this.options.from,
      to: this.options.to,
      subject: this.options.subject,
      text: batch.map((r) => `${this.formatter.format(r)}${LINE_TERMINATOR}`).join(""),
    }
  }

  private dispatch(): void {
    const batch = this.buffer
    this.buffer = []

    const sending: Promise<void> = this.deps.transport
      .send(this.compose(batch))
      .then(
        () => undefined,
        (err: unknown) => {
          this.failures.push(err)
          this.diagnostics.error("Log digest could not be sent", {
            err,
            records: batch.length,
          })
        },
      )
      .finally(() => {
        this.inFlight.delete(sending)
      })

    this.inFlight.add(sending)
  }
}

export function openMailSink(
  options: BufferedMailSinkOptions & { server: SmtpServerOptions },
  deps: Partial<BufferedMailSinkDeps> = {},
): SinkResult<BufferedMailSink> {
  const problem = findProblem(options)
  if (problem) {
    return { ok: false, error: new SinkConstructionError("mail", problem) }
  }

  const { server, ...sinkOptions } = options

  try {
    const transport =
      deps.transport ??
      createSmtpTransport({
        host: server.host,
        port: server.port,
        ...(server.username !== undefined && { username: server.username }),
        ...(server.password !== undefined && { password: server.password }),
      })

    return { ok: true, sink: new BufferedMailSink(sinkOptions, { ...deps, transport }) }
  } catch (err) {
    return {
      ok: false,
      error: new SinkConstructionError("mail", "SMTP transport could not be created", {
        cause: err,
        context: { host: server.host },
      }),
    }
  }
}

function findProblem(options: BufferedMailSinkOptions & { server: SmtpServerOptions }) {
  if (options.server.host.trim() === "") return "SMTP host is empty"
  if (options.from.trim() === "") return "Sender address is empty"

  const recipients = toRecipientList(options.to)
  if (recipients.length === 0) return "No recipients configured"

  return undefined
}
