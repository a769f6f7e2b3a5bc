import type { StorageKey } from "@stowage/storage"
import { GatewayError } from "../../model/gateway.errors"

/** S3 limit, measured in UTF-8 bytes */
export const MAX_OBJECT_KEY_BYTES = 1024

/** Reason `key` cannot address an object, or null. Keys are not required to be generated ones. */
export function validateObjectKey(key: StorageKey): string | null {
  if (key.length === 0) return "must not be empty"
  if (Buffer.byteLength(key, "utf8") > MAX_OBJECT_KEY_BYTES) {
    return `must be at most ${MAX_OBJECT_KEY_BYTES} bytes`
  }

  return null
}

export function assertValidObjectKey(key: StorageKey, operation: string): void {
  const reason = validateObjectKey(key)

  if (reason !== null) throw GatewayError.invalidObjectKey(operation, reason)
}
