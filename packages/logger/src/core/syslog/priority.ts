import type { CanonicalLevel } from "../../ports/log-level"

export const facilities = {
  kern: 0,
  user: 1,
  mail: 2,
  daemon: 3,
  auth: 4,
  syslog: 5,
  lpr: 6,
  news: 7,
  uucp: 8,
  cron: 9,
  authpriv: 10,
  ftp: 11,
  local0: 16,
  local1: 17,
  local2: 18,
  local3: 19,
  local4: 20,
  local5: 21,
  local6: 22,
  local7: 23,
} as const

export type SyslogFacility = keyof typeof facilities

const SEVERITY: Record<CanonicalLevel, number> = {
  DEBUG: 7,
  INFO: 6,
  WARNING: 4,
  ERROR: 3,
  CRITICAL: 2,
}

export function encodePriority(facility: SyslogFacility, level: CanonicalLevel): number {
  return facilities[facility] * 8 + SEVERITY[level]
}

/** `<PRI>` + line + NUL, UTF-8 encoded. */
export function frameSyslogMessage(
  line: string,
  level: CanonicalLevel,
  facility: SyslogFacility = "user",
): Buffer {
  return Buffer.from(`<${encodePriority(facility, level)}>${line}\u0000`, "utf8")
}
