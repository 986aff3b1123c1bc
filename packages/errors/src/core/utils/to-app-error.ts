import type { AppError, ErrorCode, ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"
import { isAppError } from "./is-app-error"

/**
 * Convert any thrown value to an AppError.
 *
 * AppErrors pass through unchanged. Anything else is wrapped under
 * `fallbackCode`, keeping the original as `cause`, with `context` merged in.
 */
export function toAppError(
  err: unknown,
  fallbackCode: ErrorCode = "unknown",
  context: ErrorContext = {},
): AppError {
  if (isAppError(err)) {
    return err
  }

  if (err instanceof Error) {
    return new BaseError(err.message, { code: fallbackCode, cause: err, context })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? context : { ...context, value: err },
  })
}
