import type { Seconds } from "@stowage/clock"
import { StorageError, type StorageErrorContext } from "./storage.errors"

export const DEFAULT_PRESIGN_EXPIRY_SECONDS: Seconds = 900
export const MIN_PRESIGN_EXPIRY_SECONDS: Seconds = 1
/** Seven days, the SigV4 maximum. */
export const MAX_PRESIGN_EXPIRY_SECONDS: Seconds = 604_800

export function isValidPresignExpiry(expiresInSeconds: Seconds): boolean {
  return (
    Number.isInteger(expiresInSeconds) &&
    expiresInSeconds >= MIN_PRESIGN_EXPIRY_SECONDS &&
    expiresInSeconds <= MAX_PRESIGN_EXPIRY_SECONDS
  )
}

/** Applies the default and throws `invalid_expiry` outside 1..604800 seconds. */
export function resolvePresignExpiry(
  expiresInSeconds: Seconds | undefined,
  context: StorageErrorContext,
): Seconds {
  const expiry = expiresInSeconds ?? DEFAULT_PRESIGN_EXPIRY_SECONDS

  if (!isValidPresignExpiry(expiry)) {
    throw StorageError.invalidExpiry(context, expiry, {
      min: MIN_PRESIGN_EXPIRY_SECONDS,
      max: MAX_PRESIGN_EXPIRY_SECONDS,
    })
  }

  return expiry
}
