import { z } from "zod"
import { syslogTransports } from "../../adapters/syslog/socket"

/** Numbers arrive as strings from env files; the factories coerce them. */
const numeric = z.union([z.string(), z.number()]).optional()
const text = z.string().optional()

export const loggingConfigSchema = z.object({
  LOG_NAME: text,
  LOG_LEVEL: text,
  LOG_TIME_ZONE: text,

  LOG_FILE: text,
  LOG_MAX_BYTES: numeric,
  LOG_BACKUP_COUNT: numeric,
  LOG_ENCODING: text,

  SMTP_HOST: text,
  SMTP_PORT: numeric,
  SMTP_USERNAME: text,
  SMTP_PASSWORD: text,
  SMTP_FROM: text,
  /** Comma-separated. */
  SMTP_TO: text,
  SMTP_SUBJECT: text,
  SMTP_CAPACITY: numeric,

  SYSLOG_HOST: text,
  SYSLOG_PORT: numeric,
  SYSLOG_TRANSPORT: z.enum(syslogTransports).optional(),
  SYSLOG_APP_NAME: text,
})

export type LoggingConfigValues = z.infer<typeof loggingConfigSchema>

const LOGGING_KEY = /^(LOG|SMTP|SYSLOG)_/

/** Keys in the logging namespace, known to the schema or not. */
export function isLoggingKey(key: string): boolean {
  return LOGGING_KEY.test(key)
}
