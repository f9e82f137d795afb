import { z } from "zod"
import { EnvSource } from "../../adapters/config/env-source"
import { defaultDiagnostics } from "../../adapters/diagnostics/pino-diagnostics"
import type { ConfigSource } from "../../ports/config-source"
import type { Diagnostics } from "../../ports/diagnostics"
import { ConfigurationError } from "../errors"
import { isLoggingKey, type LoggingConfigValues, loggingConfigSchema } from "./schema"

export type LoadLoggingConfigOptions = {
  /** Applied in order; later sources win. @default [new EnvSource()] */
  sources?: ConfigSource[]
  diagnostics?: Diagnostics
}

/**
 * Merge and validate logging settings. Keys in the logging namespace that the
 * schema does not know are reported, since they are usually misspellings.
 */
export async function loadLoggingConfig({
  sources,
  diagnostics,
}: LoadLoggingConfigOptions = {}): Promise<Readonly<LoggingConfigValues>> {
  const merged: Record<string, unknown> = {}
  const origin: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        origin[key] = source.name
      }
    }
  }

  const result = loggingConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new ConfigurationError(
      `Logging configuration validation failed:\n${z.prettifyError(result.error)}`,
      { cause: result.error },
    )
  }

  const known = new Set(Object.keys(loggingConfigSchema.shape))
  const unknown = Object.keys(merged).filter((key) => isLoggingKey(key) && !known.has(key))

  if (unknown.length > 0) {
    const report = diagnostics ?? defaultDiagnostics()
    for (const key of unknown) {
      report.warn(`Unknown logging setting ${key} is ignored`, { key, source: origin[key] })
    }
  }

  return Object.freeze(result.data)
}
