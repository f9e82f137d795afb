import type { CanonicalLevel } from "./log-level"

export type SourceLocation = {
  module: string
  function: string
  line: number
}

export type ProcessInfo = {
  pid: number
  processName: string
}

/** RFC 5424 PARAM-NAME → PARAM-VALUE pairs of one SD-ELEMENT. */
export type StructuredDataParams = Readonly<Record<string, unknown>>

/** SD-ID → params. Insertion order is the rendering order. */
export type StructuredData = Readonly<Record<string, StructuredDataParams>>

export type LogRecord = Readonly<{
  timestamp: Date
  level: CanonicalLevel
  loggerName: string
  message: string
  sourceLocation?: SourceLocation
  processInfo?: ProcessInfo
  structuredData?: StructuredData
  /** An exception whose cause chain is appended below the rendered line. */
  error?: unknown
}>

/** Per-call extras accepted by the logger methods. */
export type LogMeta = {
  structuredData?: StructuredData
  err?: unknown
}
