import type { LoggingConfigValues } from "../../core/config/schema"
import type { BaseLoggerOptions } from "./common"
import type { ConsoleLoggerOptions } from "./create-console-logger"
import type { FileLoggerOptions } from "./create-file-logger"
import type { MailLoggerOptions } from "./create-mail-logger"
import type { SyslogLoggerOptions } from "./create-syslog-logger"

/** LOG_NAME names the console and file loggers; mail and syslog keep their own defaults. */
function baseFrom(config: LoggingConfigValues): BaseLoggerOptions {
  return {
    ...(config.LOG_NAME !== undefined && { name: config.LOG_NAME }),
    ...(config.LOG_LEVEL !== undefined && { level: config.LOG_LEVEL }),
    ...(config.LOG_TIME_ZONE !== undefined && { timeZone: config.LOG_TIME_ZONE }),
  }
}

export function consoleOptionsFrom(config: LoggingConfigValues): ConsoleLoggerOptions {
  return baseFrom(config)
}

export function fileOptionsFrom(config: LoggingConfigValues): FileLoggerOptions {
  return {
    ...baseFrom(config),
    ...(config.LOG_FILE !== undefined && { path: config.LOG_FILE }),
    ...(config.LOG_MAX_BYTES !== undefined && { maxBytes: config.LOG_MAX_BYTES }),
    ...(config.LOG_BACKUP_COUNT !== undefined && { backupCount: config.LOG_BACKUP_COUNT }),
    ...(config.LOG_ENCODING !== undefined && { encoding: config.LOG_ENCODING }),
  }
}

export function mailOptionsFrom(config: LoggingConfigValues): MailLoggerOptions {
  const { name: _name, ...base } = baseFrom(config)

  return {
    ...base,
    ...(config.SMTP_HOST !== undefined && { host: config.SMTP_HOST }),
    ...(config.SMTP_PORT !== undefined && { port: config.SMTP_PORT }),
    ...(config.SMTP_USERNAME !== undefined && { username: config.SMTP_USERNAME }),
    ...(config.SMTP_PASSWORD !== undefined && { password: config.SMTP_PASSWORD }),
    ...(config.SMTP_FROM !== undefined && { from: config.SMTP_FROM }),
    ...(config.SMTP_TO !== undefined && { to: config.SMTP_TO }),
    ...(config.SMTP_SUBJECT !== undefined && { subject: config.SMTP_SUBJECT }),
    ...(config.SMTP_CAPACITY !== undefined && { capacity: config.SMTP_CAPACITY }),
  }
}

export function syslogOptionsFrom(config: LoggingConfigValues): SyslogLoggerOptions {
  const { name: _name, ...base } = baseFrom(config)

  return {
    ...base,
    ...(config.SYSLOG_HOST !== undefined && { host: config.SYSLOG_HOST }),
    ...(config.SYSLOG_PORT !== undefined && { port: config.SYSLOG_PORT }),
    ...(config.SYSLOG_TRANSPORT !== undefined && { transport: config.SYSLOG_TRANSPORT }),
    ...(config.SYSLOG_APP_NAME !== undefined && { appName: config.SYSLOG_APP_NAME }),
  }
}
