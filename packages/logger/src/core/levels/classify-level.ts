import type { Diagnostics } from "../../ports/diagnostics"
import type { CanonicalLevel } from "../../ports/log-level"

export const DEFAULT_LEVEL: CanonicalLevel = "INFO"

/**
 * Probe order matters: "DEBUG_INFO" is DEBUG, "ERROR_CRITICAL" is ERROR.
 * WARN rather than WARNING so the common short spelling matches.
 */
const PROBES: ReadonlyArray<readonly [string, CanonicalLevel]> = [
  ["DEBUG", "DEBUG"],
  ["INFO", "INFO"],
  ["WARN", "WARNING"],
  ["ERROR", "ERROR"],
  ["CRITICAL", "CRITICAL"],
]

export type ClassifyLevelOptions = {
  fallback?: CanonicalLevel
  diagnostics?: Diagnostics
}

/**
 * Map any input onto a canonical level by case-insensitive substring match.
 * Unmatched input yields the fallback and a warning.
 */
export function classifyLevel(input: unknown, opts: ClassifyLevelOptions = {}): CanonicalLevel {
  const fallback = opts.fallback ?? DEFAULT_LEVEL
  const normalized = String(input).toUpperCase()

  for (const [probe, level] of PROBES) {
    if (normalized.includes(probe)) return level
  }

  opts.diagnostics?.warn(`Couldn't parse inputted loglevel, using default ${fallback}`, {
    input: normalized,
  })

  return fallback
}
