import type { Logger } from "../../core/logger"
import type { LoggerRegistry } from "../../core/registry"
import { openRotatingFileSink } from "../file/rotating-file-sink"
import { coerceInteger, resolveEncoding } from "./coerce"
import {
  type BaseLoggerOptions,
  type FactoryDeps,
  lookupLogger,
  resolveBase,
  sinkOrFallback,
} from "./common"
import { LOGGER_DEFAULTS } from "./defaults"

export type FileLoggerOptions = BaseLoggerOptions & {
  path?: string
  maxBytes?: unknown
  backupCount?: unknown
  encoding?: unknown
  lazy?: boolean
}

export function createFileLogger(
  registry: LoggerRegistry,
  options: FileLoggerOptions = {},
  deps: FactoryDeps = {},
): Logger {
  const base = resolveBase(options, deps)
  const { diagnostics } = base
  const logger = lookupLogger(registry, options.name ?? LOGGER_DEFAULTS.fileName, deps)

  const result = openRotatingFileSink(
    {
      path: options.path ?? "",
      level: base.level,
      timeZone: base.timeZone,
      maxBytes: coerceInteger("MaxBytes", options.maxBytes, LOGGER_DEFAULTS.maxBytes, { min: 0 }, diagnostics),
      backupCount: coerceInteger(
        "BackupCount",
        options.backupCount,
        LOGGER_DEFAULTS.backupCount,
        { min: 0 },
        diagnostics,
      ),
      encoding: resolveEncoding(options.encoding, diagnostics),
      ...(options.lazy !== undefined && { lazy: options.lazy }),
    },
    {
      diagnostics,
      ...(deps.clock && { clock: deps.clock }),
    },
  )

  const sink = sinkOrFallback(result, "Logfile couldn't be created or given path is empty", base, deps)

  return logger.addSink(sink)
}
