import { ConfigurationError } from "../../core/errors"
import type { ConfigSource } from "../../ports/config-source"
import { type ConfigFileOptions, readConfigFile } from "./read-config-file"

export type JsonSourceOptions = ConfigFileOptions

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readConfigFile(this.opts)
    if (content === undefined) return {}

    const parsed: unknown = JSON.parse(content)
    if (!isPlainObject(parsed)) {
      throw new ConfigurationError(`${this.opts.file} must contain a JSON object`, {
        context: { file: this.opts.file },
      })
    }

    return { ...parsed }
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
