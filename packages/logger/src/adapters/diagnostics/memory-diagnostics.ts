import type { DiagnosticMeta, Diagnostics } from "../../ports/diagnostics"

export type DiagnosticEntry = {
  level: "warn" | "error"
  message: string
  meta: DiagnosticMeta
}

export class MemoryDiagnostics implements Diagnostics {
  readonly entries: DiagnosticEntry[] = []

  warn(message: string, meta: DiagnosticMeta = {}): void {
    this.entries.push({ level: "warn", message, meta })
  }

  error(message: string, meta: DiagnosticMeta = {}): void {
    this.entries.push({ level: "error", message, meta })
  }

  messages(): string[] {
    return this.entries.map((e) => e.message)
  }

  clear(): void {
    this.entries.length = 0
  }
}
