import type { Logger } from "../../core/logger"
import type { LoggerRegistry } from "../../core/registry"
import type { SyslogFacility } from "../../core/syslog/priority"
import type { SyslogSocketFactory, SyslogTransport } from "../syslog/socket"
import { openSyslogSink } from "../syslog/syslog-sink"
import { coerceInteger, PORT_BOUNDS } from "./coerce"
import {
  type BaseLoggerOptions,
  type FactoryDeps,
  lookupLogger,
  resolveBase,
  sinkOrFallback,
} from "./common"
import { LOGGER_DEFAULTS } from "./defaults"

export type SyslogLoggerOptions = BaseLoggerOptions & {
  host?: string
  port?: unknown
  transport?: SyslogTransport
  appName?: string
  facility?: SyslogFacility
}

export type SyslogLoggerDeps = FactoryDeps & {
  createSocket?: SyslogSocketFactory
  resolveAddress?: (host: string) => Promise<string>
  hostname?: () => string
}

/** Resolves once the collector address is known and, for TCP, connected. */
export async function createSyslogLogger(
  registry: LoggerRegistry,
  options: SyslogLoggerOptions = {},
  deps: SyslogLoggerDeps = {},
): Promise<Logger> {
  const base = resolveBase(options, deps)
  const { diagnostics } = base

  const port = coerceInteger("Port", options.port, LOGGER_DEFAULTS.syslogPort, PORT_BOUNDS, diagnostics)
  const logger = lookupLogger(registry, options.name ?? LOGGER_DEFAULTS.syslogName, deps)

  const result = await openSyslogSink(
    {
      host: options.host ?? "",
      port,
      level: base.level,
      timeZone: base.timeZone,
      ...(options.transport && { transport: options.transport }),
      ...(options.appName !== undefined && { appName: options.appName }),
      ...(options.facility && { facility: options.facility }),
    },
    {
      diagnostics,
      ...(deps.clock && { clock: deps.clock }),
      ...(deps.createSocket && { createSocket: deps.createSocket }),
      ...(deps.resolveAddress && { resolveAddress: deps.resolveAddress }),
      ...(deps.hostname && { hostname: deps.hostname }),
    },
  )

  const sink = sinkOrFallback(result, "SysLog Address or Port are wrong or unavailable", base, deps)

  return logger.addSink(sink)
}
