import * as fs from "node:fs"
import { gzipSync } from "node:zlib"

export function archivePath(basePath: string, index: number): string {
  return `${basePath}.${index}.gz`
}

/** Gzip `src` into `dest` byte for byte, replacing `dest` if present. */
export function compressFile(src: string, dest: string): void {
  fs.writeFileSync(dest, gzipSync(fs.readFileSync(src)))
}

export function unlinkIfExists(filePath: string): void {
  try {
    fs.unlinkSync(filePath)
  } catch (err) {
    if (!isNotFoundError(err)) throw err
  }
}

export function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
