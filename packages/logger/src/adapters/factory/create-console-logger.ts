import type { Logger } from "../../core/logger"
import type { LoggerRegistry } from "../../core/registry"
import { DEFAULT_COLORS, type LevelColors } from "../../core/format/colors"
import { ConsoleSink } from "../console/console-sink"
import { type BaseLoggerOptions, type FactoryDeps, lookupLogger, resolveBase } from "./common"
import { LOGGER_DEFAULTS } from "./defaults"

export type ConsoleLoggerOptions = BaseLoggerOptions & {
  /** Per-level overrides merged over the default palette. */
  colors?: Partial<LevelColors>
}

export function createConsoleLogger(
  registry: LoggerRegistry,
  options: ConsoleLoggerOptions = {},
  deps: FactoryDeps = {},
): Logger {
  const base = resolveBase(options, deps)
  const logger = lookupLogger(registry, options.name ?? LOGGER_DEFAULTS.consoleName, deps)

  const sink = new ConsoleSink(
    {
      level: base.level,
      timeZone: base.timeZone,
      colors: { ...DEFAULT_COLORS, ...options.colors },
    },
    {
      ...(deps.clock && { clock: deps.clock }),
      ...(deps.console && { console: deps.console }),
    },
  )

  return logger.addSink(sink)
}
