import { BaseError, type ErrorContext } from "@logsmith/errors"
import type { SinkKind } from "../ports/sink"

export type LoggingErrorCode =
  | "configuration_invalid"
  | "sink_construction_failed"
  | "transmission_failed"
  | "registry_lookup_failed"
  | "registry_closed"
  | "sink_close_failed"

type LoggingErrorOptions = {
  context?: ErrorContext
  cause?: unknown
}

/** An option value could not be used; a default was substituted. */
export class ConfigurationError extends BaseError<"configuration_invalid"> {
  constructor(message: string, options: LoggingErrorOptions = {}) {
    super(message, { code: "configuration_invalid", ...options })
  }
}

export class SinkConstructionError extends BaseError<"sink_construction_failed"> {
  readonly sink: SinkKind

  constructor(sink: SinkKind, message: string, options: LoggingErrorOptions = {}) {
    super(message, {
      code: "sink_construction_failed",
      ...options,
      context: { sink, ...options.context },
    })
    this.sink = sink
  }
}

export class TransmissionError extends BaseError<"transmission_failed"> {
  constructor(message: string, options: LoggingErrorOptions = {}) {
    super(message, { code: "transmission_failed", ...options })
  }
}

export class RegistryLookupError extends BaseError<
  "registry_lookup_failed" | "registry_closed"
> {
  constructor(
    code: "registry_lookup_failed" | "registry_closed",
    message: string,
    options: LoggingErrorOptions = {},
  ) {
    super(message, { code, ...options, isOperational: false })
  }
}
