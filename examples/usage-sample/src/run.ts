import {
  consoleOptionsFrom,
  createConsoleLogger,
  createFileLogger,
  createMailLogger,
  createSyslogLogger,
  defaultDiagnostics,
  fileOptionsFrom,
  type Logger,
  LoggerRegistry,
  type MailLoggerDeps,
  mailOptionsFrom,
  type ShutdownResult,
  type SyslogLoggerDeps,
  syslogOptionsFrom,
} from "@logsmith/logger"
import { loadSampleConfig, type SampleConfigOptions } from "./load-sample-config"

export type RunOptions = SampleConfigOptions & {
  deps?: MailLoggerDeps & SyslogLoggerDeps
}

function logEveryLevel(logger: Logger): void {
  logger.debug("debug message")
  logger.info("info message")
  logger.warning("warn message")
  logger.error("error message")
  logger.critical("critical message")
}

/**
 * Builds a logger for every sink the configuration names and sends sample
 * messages through each. Console output is always on; file, mail and syslog
 * output need LOG_FILE, SMTP_HOST and SYSLOG_HOST.
 */
export async function run({ deps = {}, ...configOptions }: RunOptions): Promise<ShutdownResult> {
  const diagnostics = deps.diagnostics ?? defaultDiagnostics()
  const config = await loadSampleConfig({ ...configOptions, diagnostics })
  const registry = new LoggerRegistry(deps.clock ? { clock: deps.clock } : {})

  logEveryLevel(createConsoleLogger(registry, consoleOptionsFrom(config), deps))

  if (config.LOG_FILE !== undefined) {
    logEveryLevel(createFileLogger(registry, fileOptionsFrom(config), deps))
  }

  if (config.SMTP_HOST !== undefined) {
    const { logger, sink } = createMailLogger(registry, mailOptionsFrom(config), deps)
    logger.info("test message")

    try {
      await sink.flush()
    } catch (err) {
      diagnostics.error("Sample digest was not delivered", { err })
    }
  }

  if (config.SYSLOG_HOST !== undefined) {
    const logger = await createSyslogLogger(registry, syslogOptionsFrom(config), deps)
    logger.error("Message", {
      structuredData: {
        "user1@host1": { key1: "value1", key2: "value2" },
        "some@thing": { key3: "value3", key4: "value4" },
      },
    })
  }

  return registry.shutdown()
}
