import { parseArgs } from "node:util"
import {
  type ConfigSource,
  type Diagnostics,
  DotenvSource,
  EnvSource,
  type LoggingConfigValues,
  loadLoggingConfig,
  ObjectSource,
} from "@logsmith/logger"

/** `--level debug` and `--utc` override the environment. */
export function argvOverrides(argv: string[]): Record<string, unknown> {
  const { values } = parseArgs({
    args: argv,
    options: {
      level: { type: "string", short: "l" },
      utc: { type: "boolean" },
    },
    strict: true,
  })

  return {
    ...(values.level !== undefined && { LOG_LEVEL: values.level }),
    ...(values.utc && { LOG_TIME_ZONE: "utc" }),
  }
}

export type SampleConfigOptions = {
  env: NodeJS.ProcessEnv
  argv?: string[]
  cwd?: string
  diagnostics?: Diagnostics
}

export async function loadSampleConfig({
  env,
  argv = [],
  cwd = process.cwd(),
  diagnostics,
}: SampleConfigOptions): Promise<Readonly<LoggingConfigValues>> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: ".env", required: false, cwd }),
    new EnvSource({ env }),
    new ObjectSource(argvOverrides(argv), "argv"),
  ]

  return loadLoggingConfig({ sources, ...(diagnostics && { diagnostics }) })
}
