import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard to check if a value is an AppError.
 *
 * Structural, so errors raised by another copy of this package are recognized too.
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error) || !isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp)
  )
}
