import type { AppError, ErrorCode, ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

/**
 * Convert any thrown value to an AppError.
 *
 * - BaseError passes through unchanged
 * - Error instances are wrapped as non-operational (assume unexpected)
 * - other values are wrapped as non-operational with the value in context
 *
 * @param fallbackCode - Code for values that are not already an AppError. Default: "unknown"
 */
export function toAppError(
  err: unknown,
  fallbackCode: ErrorCode = "unknown",
  context: ErrorContext = {},
): AppError {
  if (err instanceof BaseError) {
    return err
  }

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      context,
      cause: err,
      isOperational: false,
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? context : { ...context, value: err },
    isOperational: false,
  })
}
