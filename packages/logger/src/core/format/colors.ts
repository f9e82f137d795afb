import type { CanonicalLevel } from "../../ports/log-level"

export type LevelColors = Readonly<Record<CanonicalLevel, string>> & {
  readonly reset: string
}

export const DEFAULT_COLORS: LevelColors = {
  DEBUG: "\x1b[34;20m", // blue
  INFO: "\x1b[38;20m", // grey
  WARNING: "\x1b[33;20m", // yellow
  ERROR: "\x1b[31;20m", // red
  CRITICAL: "\x1b[31;1m", // bold red
  reset: "\x1b[0m",
}

export function colorize(line: string, level: CanonicalLevel, colors: LevelColors): string {
  return `${colors[level]}${line}${colors.reset}`
}
