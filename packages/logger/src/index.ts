export { DotenvSource, type DotenvSourceOptions } from "./adapters/config/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/config/env-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/config/json-source"
export { ObjectSource } from "./adapters/config/object-source"
export {
  ConsoleSink,
  type ConsoleSinkDeps,
  type ConsoleSinkOptions,
  type ConsoleWriter,
} from "./adapters/console/console-sink"
export { type DiagnosticEntry, MemoryDiagnostics } from "./adapters/diagnostics/memory-diagnostics"
export {
  defaultDiagnostics,
  PinoDiagnostics,
  type PinoDiagnosticsDeps,
} from "./adapters/diagnostics/pino-diagnostics"
export type { BaseLoggerOptions, FactoryDeps } from "./adapters/factory/common"
export { type ConsoleLoggerOptions, createConsoleLogger } from "./adapters/factory/create-console-logger"
export { createFileLogger, type FileLoggerOptions } from "./adapters/factory/create-file-logger"
export {
  createMailLogger,
  type MailLogger,
  type MailLoggerDeps,
  type MailLoggerOptions,
} from "./adapters/factory/create-mail-logger"
export {
  createSyslogLogger,
  type SyslogLoggerDeps,
  type SyslogLoggerOptions,
} from "./adapters/factory/create-syslog-logger"
export { LOGGER_DEFAULTS } from "./adapters/factory/defaults"
export {
  consoleOptionsFrom,
  fileOptionsFrom,
  mailOptionsFrom,
  syslogOptionsFrom,
} from "./adapters/factory/from-config"
export {
  openRotatingFileSink,
  RotatingFileSink,
  type RotatingFileSinkDeps,
  type RotatingFileSinkOptions,
} from "./adapters/file/rotating-file-sink"
export {
  BufferedMailSink,
  type BufferedMailSinkDeps,
  type BufferedMailSinkOptions,
  openMailSink,
  type SmtpServerOptions,
} from "./adapters/mail/buffered-mail-sink"
export { createSyslogSocket } from "./adapters/syslog/create-socket"
export type {
  SyslogEndpoint,
  SyslogSocket,
  SyslogSocketFactory,
  SyslogTransport,
} from "./adapters/syslog/socket"
export {
  type OpenSyslogSinkDeps,
  openSyslogSink,
  SyslogSink,
  type SyslogSinkDeps,
  type SyslogSinkOptions,
} from "./adapters/syslog/syslog-sink"
export { type LoadLoggingConfigOptions, loadLoggingConfig } from "./core/config/load-logging-config"
export { isLoggingKey, type LoggingConfigValues, loggingConfigSchema } from "./core/config/schema"
export {
  ConfigurationError,
  type LoggingErrorCode,
  RegistryLookupError,
  SinkConstructionError,
  TransmissionError,
} from "./core/errors"
export { DEFAULT_COLORS, type LevelColors } from "./core/format/colors"
export { LineFormatter, type LinePattern, patternFor } from "./core/format/line-formatter"
export { classifyLevel, DEFAULT_LEVEL } from "./core/levels/classify-level"
export { currentProcessInfo, Logger, type LoggerDeps } from "./core/logger"
export {
  LoggerRegistry,
  ROOT_LOGGER,
  type ShutdownFailure,
  type ShutdownResult,
} from "./core/registry"
export { encodePriority, facilities, frameSyslogMessage, type SyslogFacility } from "./core/syslog/priority"
export { formatRfc5424, formatStructuredData } from "./core/syslog/rfc5424"
export type { ConfigSource } from "./ports/config-source"
export type { DiagnosticMeta, Diagnostics } from "./ports/diagnostics"
export { type CanonicalLevel, canonicalLevels, isLevelEnabled, type LogLevel, LogLevels } from "./ports/log-level"
export type {
  LogMeta,
  LogRecord,
  ProcessInfo,
  SourceLocation,
  StructuredData,
  StructuredDataParams,
} from "./ports/log-record"
export type { Sink, SinkFailed, SinkKind, SinkOpened, SinkResult } from "./ports/sink"
export { type TimeZoneStyle, timeZoneStyles } from "./ports/time-zone"
