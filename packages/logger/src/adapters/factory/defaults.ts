import type { CanonicalLevel } from "../../ports/log-level"
import type { TimeZoneStyle } from "../../ports/time-zone"

export const LOGGER_DEFAULTS = {
  consoleName: "root",
  fileName: "File",
  mailName: "SMTP",
  syslogName: "SysLog",
  level: "INFO" satisfies CanonicalLevel,
  timeZone: "local" satisfies TimeZoneStyle,

  maxBytes: 10 * 1024 * 1024,
  backupCount: 5,
  encoding: "utf8" satisfies BufferEncoding,

  smtpPort: 587,
  capacity: 100,

  syslogPort: 1514,
} as const
