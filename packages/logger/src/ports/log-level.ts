export const canonicalLevels = ["DEBUG", "INFO", "WARNING", "ERROR", "CRITICAL"] as const

export type CanonicalLevel = (typeof canonicalLevels)[number]

/**
 * Numeric log severity levels.
 *
 * These values define the ordering of log levels for comparison
 * and filtering (higher = more severe).
 */
export const LogLevels = {
  /** Detailed diagnostic output; switches lines to the verbose pattern. */
  Debug: 10,
  /** Confirmation that things are working as expected. */
  Info: 20,
  /** Something unexpected happened, or may happen soon; work continues. */
  Warning: 30,
  /** A failure prevented some operation from completing. */
  Error: 40,
  /** A failure after which the program may be unable to continue. */
  Critical: 50,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export const LEVEL_SEVERITY: Record<CanonicalLevel, LogLevel> = {
  DEBUG: LogLevels.Debug,
  INFO: LogLevels.Info,
  WARNING: LogLevels.Warning,
  ERROR: LogLevels.Error,
  CRITICAL: LogLevels.Critical,
}

/** True when a record at `level` passes a sink whose minimum is `minimum`. */
export function isLevelEnabled(level: CanonicalLevel, minimum: CanonicalLevel): boolean {
  return LEVEL_SEVERITY[level] >= LEVEL_SEVERITY[minimum]
}
