import type { TimeSource } from "@logsmith/clock"
import type { SinkConstructionError } from "../../core/errors"
import type { Logger } from "../../core/logger"
import type { LoggerRegistry } from "../../core/registry"
import type { Diagnostics } from "../../ports/diagnostics"
import type { CanonicalLevel } from "../../ports/log-level"
import type { Sink, SinkResult } from "../../ports/sink"
import type { TimeZoneStyle } from "../../ports/time-zone"
import { ConsoleSink, type ConsoleWriter } from "../console/console-sink"
import { defaultDiagnostics } from "../diagnostics/pino-diagnostics"
import { resolveLevel, resolveTimeZone } from "./coerce"

/** Options every factory accepts. Level and time zone are coerced, never rejected. */
export type BaseLoggerOptions = {
  name?: string
  level?: unknown
  timeZone?: unknown
}

export type FactoryDeps = {
  clock?: TimeSource
  diagnostics?: Diagnostics
  console?: ConsoleWriter

  /** Called with 1 when the registry cannot hand out a logger. */
  exit?: (code: number) => void
}

export type ResolvedBase = {
  level: CanonicalLevel
  timeZone: TimeZoneStyle
  diagnostics: Diagnostics
}

export function resolveBase(options: BaseLoggerOptions, deps: FactoryDeps): ResolvedBase {
  const diagnostics = deps.diagnostics ?? defaultDiagnostics()

  return {
    level: resolveLevel(options.level, diagnostics),
    timeZone: resolveTimeZone(options.timeZone),
    diagnostics,
  }
}

/**
 * Registry lookup for the factories. A failure here is unrecoverable: it is
 * reported and the process exits.
 */
export function lookupLogger(registry: LoggerRegistry, name: string, deps: FactoryDeps): Logger {
  try {
    return registry.getLogger(name)
  } catch (err) {
    const diagnostics = deps.diagnostics ?? defaultDiagnostics()
    diagnostics.error(`Error while creating ${name} Logger`, { err })

    const exit = deps.exit ?? ((code: number) => process.exit(code))
    exit(1)

    throw err
  }
}

/** Uncolored console output, used when the requested sink cannot be built. */
export function fallbackSink(base: ResolvedBase, deps: FactoryDeps): ConsoleSink {
  return new ConsoleSink(
    { level: base.level, timeZone: base.timeZone, colors: false },
    {
      ...(deps.clock && { clock: deps.clock }),
      ...(deps.console && { console: deps.console }),
    },
  )
}

/** Unwrap a sink result, degrading to console output with a warning on failure. */
export function sinkOrFallback<S extends Sink>(
  result: SinkResult<S>,
  reason: string,
  base: ResolvedBase,
  deps: FactoryDeps,
): S | ConsoleSink {
  if (result.ok) return result.sink

  reportFallback(result.error, reason, base)
  return fallbackSink(base, deps)
}

function reportFallback(error: SinkConstructionError, reason: string, base: ResolvedBase): void {
  base.diagnostics.warn(`${reason}, changing to console output`, { err: error, sink: error.sink })
}
