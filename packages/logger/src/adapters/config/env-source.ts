import { isLoggingKey } from "../../core/config/schema"
import type { ConfigSource } from "../../ports/config-source"

export type EnvSourceOptions = {
  /**
   * Read `<prefix>LOG_LEVEL` instead of `LOG_LEVEL`, for processes that run
   * several logging setups side by side.
   */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Reads the `LOG_*`, `SMTP_*` and `SYSLOG_*` variables. The rest of the
 * environment is left alone.
 */
export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    const settings: Record<string, string> = {}

    for (const [name, value] of Object.entries(this.env)) {
      if (value === undefined || !name.startsWith(this.prefix)) continue

      const key = name.slice(this.prefix.length)
      if (isLoggingKey(key)) settings[key] = value
    }

    return settings
  }
}
