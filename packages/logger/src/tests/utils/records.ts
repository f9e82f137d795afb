import type { LogRecord } from "../../ports/log-record"

/** 2024-01-15T10:30:00.042Z */
export const FIXED_INSTANT = Date.UTC(2024, 0, 15, 10, 30, 0, 42)

export function makeRecord(overrides: Partial<LogRecord> = {}): LogRecord {
  return {
    timestamp: new Date(FIXED_INSTANT),
    level: "INFO",
    loggerName: "app",
    message: "hello",
    processInfo: { pid: 4242, processName: "node" },
    ...overrides,
  }
}
