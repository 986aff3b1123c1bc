import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Structural guard for {@link AppError}. Accepts errors from another copy of
 * this package, which `instanceof BaseError` would reject.
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error) || !isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    e.timestamp instanceof Date &&
    Number.isFinite(e.timestamp.valueOf())
  )
}
