import pino, { type DestinationStream, type Logger as PinoLoggerBase } from "pino"
import { errWithCause } from "pino-std-serializers"
import type { DiagnosticMeta, Diagnostics } from "../../ports/diagnostics"

export type PinoDiagnosticsDeps = {
  /** Base pino logger to report through. Wins over `destination`. */
  base?: PinoLoggerBase

  /** Where JSON lines go. Defaults to a synchronous stderr stream. */
  destination?: DestinationStream
}

/**
 * Reports the library's own warnings as JSON lines on stderr.
 */
export class PinoDiagnostics implements Diagnostics {
  private readonly logger: PinoLoggerBase

  constructor(deps: PinoDiagnosticsDeps = {}) {
    this.logger = deps.base ?? this.init(deps.destination)
  }

  private init(destination?: DestinationStream): PinoLoggerBase {
    return pino(
      {
        name: "logsmith",
        level: "warn",
        serializers: { err: errWithCause },
      },
      destination ?? pino.destination({ dest: 2, sync: true }),
    )
  }

  warn(message: string, meta: DiagnosticMeta = {}): void {
    this.logger.warn(meta, message)
  }

  error(message: string, meta: DiagnosticMeta = {}): void {
    this.logger.error(meta, message)
  }
}

let shared: PinoDiagnostics | undefined

/** Process-wide stderr diagnostics, created on first use. */
export function defaultDiagnostics(): Diagnostics {
  shared ??= new PinoDiagnostics()
  return shared
}
