import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/config-source"
import { type ConfigFileOptions, readConfigFile } from "./read-config-file"

export type DotenvSourceOptions = ConfigFileOptions

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readConfigFile(this.opts)
    return content === undefined ? {} : parse(content)
  }
}
