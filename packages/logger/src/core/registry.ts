import { type AppError, toAppError } from "@logsmith/errors"
import type { Sink } from "../ports/sink"
import { RegistryLookupError } from "./errors"
import { Logger, type LoggerDeps } from "./logger"

export const ROOT_LOGGER = "root"

export type ShutdownFailure = {
  logger: string
  sink: Sink["kind"]

  /** Errors that are not already AppErrors arrive wrapped, with the original as `cause`. */
  error: AppError
}

export type ShutdownResult = {
  ok: boolean
  failures: ShutdownFailure[]
}

/**
 * Owns every logger of the process. Create one at startup and pass it to the
 * factories; `shutdown` at exit flushes and closes everything they attached.
 */
export class LoggerRegistry {
  private readonly loggers = new Map<string, Logger>()
  private closed = false

  constructor(private readonly deps: LoggerDeps = {}) {}

  /**
   * The logger registered under `name`, created on first request.
   * `""` and `"root"` both name the root logger.
   *
   * @throws RegistryLookupError after `shutdown`, or for a non-string name.
   */
  getLogger(name: string = ROOT_LOGGER): Logger {
    if (this.closed) {
      throw new RegistryLookupError("registry_closed", `Registry is shut down; cannot look up ${name}`, {
        context: { name },
      })
    }

    if (typeof name !== "string") {
      throw new RegistryLookupError("registry_lookup_failed", "Logger name must be a string", {
        context: { name: String(name) },
      })
    }

    const key = name === "" ? ROOT_LOGGER : name
    const existing = this.loggers.get(key)
    if (existing) return existing

    const logger = new Logger(key, this.deps)
    this.loggers.set(key, logger)

    return logger
  }

  get root(): Logger {
    return this.getLogger(ROOT_LOGGER)
  }

  has(name: string): boolean {
    return this.loggers.has(name === "" ? ROOT_LOGGER : name)
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Close every sink once, even when shared between loggers. Failures are
   * collected, not thrown. Later calls return an empty success.
   */
  async shutdown(): Promise<ShutdownResult> {
    if (this.closed) return { ok: true, failures: [] }
    this.closed = true

    const owners = new Map<Sink, string>()
    for (const logger of this.loggers.values()) {
      for (const sink of logger.getSinks()) {
        if (!owners.has(sink)) owners.set(sink, logger.name)
      }
    }

    const entries = [...owners.entries()]
    const results = await Promise.allSettled(entries.map(([sink]) => sink.close()))

    const failures: ShutdownFailure[] = []
    results.forEach((result, i) => {
      const entry = entries[i]
      if (result.status === "rejected" && entry) {
        failures.push({ logger: entry[1], sink: entry[0].kind, error: toAppError(result.reason, "sink_close_failed") })
      }
    })

    return { ok: failures.length === 0, failures }
  }
}
