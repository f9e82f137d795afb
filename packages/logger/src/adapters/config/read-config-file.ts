import fs from "node:fs/promises"
import path from "node:path"
import { isNotFoundError } from "../file/archive"

export type ConfigFileOptions = {
  /** Absolute, or relative to `cwd`. */
  file: string

  /** When false, a missing file loads as empty. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

/** File contents, or `undefined` for a missing optional file. */
export async function readConfigFile(opts: ConfigFileOptions): Promise<string | undefined> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  try {
    return await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!opts.required && isNotFoundError(err)) return undefined
    throw err
  }
}
