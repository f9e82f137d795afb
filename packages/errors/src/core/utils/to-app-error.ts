import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"

/**
 * Convert any thrown value to an AppError.
 *
 * - BaseError passes through unchanged
 * - Error instances are wrapped as operational (I/O failures surface as plain Errors)
 * - Non-Error values are wrapped with isOperational: false
 *
 * @param fallbackCode - Code to use if not already an AppError. Default: "unknown"
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (err instanceof BaseError) {
    return err
  }

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      context: errnoContext(err),
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}

const ERRNO_FIELDS = { code: "errno", syscall: "syscall", path: "path" } as const

function errnoContext(err: Error): Record<string, unknown> {
  const context: Record<string, unknown> = {}

  for (const [field, key] of Object.entries(ERRNO_FIELDS)) {
    const value: unknown = Reflect.get(err, field)
    if (typeof value === "string") context[key] = value
  }

  return context
}
