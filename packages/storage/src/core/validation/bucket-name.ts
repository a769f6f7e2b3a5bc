import type { StorageBucket } from "../../ports/storage-object"
import { StorageError } from "../storage.errors"

export type BucketNameRule = "length" | "charset" | "edge" | "consecutive_dots"

export type BucketNameViolation = {
  rule: BucketNameRule
  reason: string
}

export const MIN_BUCKET_NAME_LENGTH = 3
export const MAX_BUCKET_NAME_LENGTH = 63

const CHARSET = /^[a-z0-9.-]+$/
const ALPHANUMERIC = /[a-z0-9]/

/**
 * DNS-label rules shared by S3-compatible backends. Returns the first rule
 * that `name` breaks, or null when it is valid. Total: never throws.
 */
export function validateBucketName(name: string): BucketNameViolation | null {
  if (name.length < MIN_BUCKET_NAME_LENGTH || name.length > MAX_BUCKET_NAME_LENGTH) {
    return {
      rule: "length",
      reason: `must be ${MIN_BUCKET_NAME_LENGTH} to ${MAX_BUCKET_NAME_LENGTH} characters long`,
    }
  }

  if (!CHARSET.test(name)) {
    return {
      rule: "charset",
      reason: "may only contain lowercase letters, digits, dots and hyphens",
    }
  }

  if (!ALPHANUMERIC.test(name.charAt(0)) || !ALPHANUMERIC.test(name.charAt(name.length - 1))) {
    return { rule: "edge", reason: "must start and end with a letter or digit" }
  }

  if (name.includes("..")) {
    return { rule: "consecutive_dots", reason: "must not contain two adjacent dots" }
  }

  return null
}

/** Throws `invalid_bucket_name` unless `bucket` passes validateBucketName. */
export function assertValidBucketName(bucket: StorageBucket, operation: string): void {
  const violation = validateBucketName(bucket)

  if (violation) {
    throw StorageError.invalidBucketName({ operation, bucket }, violation.rule, violation.reason)
  }
}
