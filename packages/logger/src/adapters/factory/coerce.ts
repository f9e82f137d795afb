import { z } from "zod"
import { classifyLevel } from "../../core/levels/classify-level"
import type { Diagnostics } from "../../ports/diagnostics"
import type { CanonicalLevel } from "../../ports/log-level"
import type { TimeZoneStyle } from "../../ports/time-zone"
import { LOGGER_DEFAULTS } from "./defaults"

export type IntegerBounds = { min: number; max?: number }

function integerSchema({ min, max }: IntegerBounds) {
  const base = z.coerce.number().int().min(min)
  return max === undefined ? base : base.max(max)
}

/**
 * Accept a number or numeric string; anything else becomes `fallback` with a
 * warning naming the option.
 */
export function coerceInteger(
  label: string,
  input: unknown,
  fallback: number,
  bounds: IntegerBounds,
  diagnostics: Diagnostics,
): number {
  if (input === undefined || input === null) return fallback

  const blank = typeof input === "string" && input.trim() === ""
  const result = integerSchema(bounds).safeParse(input)

  if (!blank && result.success) return result.data

  diagnostics.warn(`The ${label} has to be int, defaulting to ${label} ${fallback}`, {
    input: String(input),
    ...(!result.success && { reason: z.prettifyError(result.error) }),
  })

  return fallback
}

export const PORT_BOUNDS: IntegerBounds = { min: 1, max: 65_535 }

/** `"utc"` in any case selects UTC; every other value means local time. */
export function resolveTimeZone(input: unknown): TimeZoneStyle {
  if (input === undefined || input === null) return LOGGER_DEFAULTS.timeZone
  return String(input).toLowerCase() === "utc" ? "utc" : "local"
}

export function resolveLevel(input: unknown, diagnostics: Diagnostics): CanonicalLevel {
  if (input === undefined || input === null) return LOGGER_DEFAULTS.level
  return classifyLevel(input, { fallback: LOGGER_DEFAULTS.level, diagnostics })
}

export function resolveEncoding(input: unknown, diagnostics: Diagnostics): BufferEncoding {
  if (input === undefined || input === null) return LOGGER_DEFAULTS.encoding

  const name = String(input).toLowerCase()
  if (Buffer.isEncoding(name)) return name

  diagnostics.warn(`Unknown encoding ${name}, defaulting to ${LOGGER_DEFAULTS.encoding}`)
  return LOGGER_DEFAULTS.encoding
}
