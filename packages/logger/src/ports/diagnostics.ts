export type DiagnosticMeta = Record<string, unknown> & {
  err?: unknown
}

/**
 * Channel for the library's own complaints: substituted defaults, degraded
 * sinks, failed sends. Never routed through the sinks being configured.
 */
export interface Diagnostics {
  warn(message: string, meta?: DiagnosticMeta): void
  error(message: string, meta?: DiagnosticMeta): void
}
