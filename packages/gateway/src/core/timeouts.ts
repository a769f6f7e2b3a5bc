import type { Milliseconds } from "@stowage/clock"

export type OperationTimeouts = {
  /** put plus the confirming head */
  uploadMs: Milliseconds
  deleteMs: Milliseconds
  /** list, stat, download open, presign and single bucket calls */
  requestMs: Milliseconds
  /** emptyBucket and bucketStats, which walk every page */
  bulkMs: Milliseconds
}

export const DEFAULT_OPERATION_TIMEOUTS: OperationTimeouts = {
  uploadMs: 60_000,
  deleteMs: 5_000,
  requestMs: 30_000,
  bulkMs: 300_000,
}
