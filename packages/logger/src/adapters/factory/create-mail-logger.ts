import type { MailRecipients, MailTransport } from "@logsmith/email"
import type { Logger } from "../../core/logger"
import type { LoggerRegistry } from "../../core/registry"
import type { ConsoleSink } from "../console/console-sink"
import { type BufferedMailSink, openMailSink } from "../mail/buffered-mail-sink"
import { coerceInteger, PORT_BOUNDS } from "./coerce"
import {
  type BaseLoggerOptions,
  type FactoryDeps,
  lookupLogger,
  resolveBase,
  sinkOrFallback,
} from "./common"
import { LOGGER_DEFAULTS } from "./defaults"

export type MailLoggerOptions = BaseLoggerOptions & {
  host?: string
  port?: unknown
  username?: string
  password?: string
  from?: string

  /** One address, a list, or a comma-separated string. */
  to?: MailRecipients
  subject?: string

  /** Records per mail. */
  capacity?: unknown
}

export type MailLoggerDeps = FactoryDeps & {
  transport?: MailTransport
}

export type MailLogger = {
  logger: Logger

  /** Flush this to send the digest; close it at exit. */
  sink: BufferedMailSink | ConsoleSink
}

export function createMailLogger(
  registry: LoggerRegistry,
  options: MailLoggerOptions = {},
  deps: MailLoggerDeps = {},
): MailLogger {
  const base = resolveBase(options, deps)
  const { diagnostics } = base

  let name = options.name ?? LOGGER_DEFAULTS.mailName
  if (name === "" || name === "root") {
    diagnostics.warn(
      `The Name can't be empty or root for this type of logger, defaulting to name ${LOGGER_DEFAULTS.mailName}`,
    )
    name = LOGGER_DEFAULTS.mailName
  }

  const port = coerceInteger("Port", options.port, LOGGER_DEFAULTS.smtpPort, PORT_BOUNDS, diagnostics)
  const capacity = coerceInteger(
    "Capacity",
    options.capacity,
    LOGGER_DEFAULTS.capacity,
    { min: 1 },
    diagnostics,
  )

  const logger = lookupLogger(registry, name, deps)

  const result = openMailSink(
    {
      level: base.level,
      timeZone: base.timeZone,
      capacity,
      from: options.from ?? "",
      to: splitRecipients(options.to),
      subject: options.subject ?? "",
      server: {
        host: options.host ?? "",
        port,
        ...(options.username !== undefined && { username: options.username }),
        ...(options.password !== undefined && { password: options.password }),
      },
    },
    {
      diagnostics,
      ...(deps.clock && { clock: deps.clock }),
      ...(deps.transport && { transport: deps.transport }),
    },
  )

  const sink = sinkOrFallback(result, "SMTP Logger couldn't be created", base, deps)
  logger.addSink(sink)

  return { logger, sink }
}

function splitRecipients(to: MailRecipients | undefined): MailRecipients {
  if (to === undefined) return []
  if (typeof to !== "string") return to

  return to
    .split(",")
    .map((address) => address.trim())
    .filter((address) => address !== "")
}
