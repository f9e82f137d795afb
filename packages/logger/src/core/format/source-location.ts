import path from "node:path"
import type { SourceLocation } from "../../ports/log-record"

// "    at fn (/abs/file.ts:12:5)", "    at /abs/file.ts:12:5", "    at async fn (file:///x.ts:3:1)"
const FRAME = /^\s*at (?:(?:async )?(.+?) \()?(.+?):(\d+):\d+\)?$/

/**
 * Where the logging call came from.
 *
 * @param entry - the public logger method that was called; frames at and above
 *   it are dropped, so the first remaining frame is the caller.
 */
export function captureSourceLocation(entry: (...args: never[]) => unknown): SourceLocation | undefined {
  const holder: { stack?: string } = {}
  Error.captureStackTrace(holder, entry)

  return parseFrame(holder.stack?.split("\n")[1])
}

export function parseFrame(frame: string | undefined): SourceLocation | undefined {
  if (!frame) return undefined

  const match = FRAME.exec(frame)
  if (!match) return undefined

  const [, fn, file, line] = match
  if (!file || !line) return undefined

  return {
    module: path.parse(file.replace(/^file:\/\//, "")).name,
    function: fn ?? "<anonymous>",
    line: Number(line),
  }
}
