import type { StoragePort } from "../ports/storage"
import type { StorageBucket } from "../ports/storage-object"
import type { SignalOptions } from "../ports/storage-options"
import type { BucketStats } from "../ports/storage-result"
import { walkObjects } from "./paginate"

export const DEFAULT_MAINTENANCE_PAGE_SIZE = 1000

export type MaintenanceOptions = SignalOptions & {
  pageSize?: number | undefined
}

/** Object count and total size, walking every page. */
export async function bucketStats(
  storage: Pick<StoragePort, "list">,
  bucket: StorageBucket,
  options: MaintenanceOptions = {},
): Promise<BucketStats> {
  let objectCount = 0
  let totalSizeInBytes = 0

  const objects = walkObjects(storage, bucket, {
    maxKeys: options.pageSize ?? DEFAULT_MAINTENANCE_PAGE_SIZE,
    signal: options.signal,
  })

  for await (const object of objects) {
    objectCount += 1
    totalSizeInBytes += object.sizeInBytes
  }

  return { bucket, objectCount, totalSizeInBytes }
}

/**
 * Deletes every object and returns how many were deleted. Always re-lists
 * from the start, so deletions never invalidate a cursor.
 */
export async function emptyBucket(
  storage: Pick<StoragePort, "list" | "deleteMany">,
  bucket: StorageBucket,
  options: MaintenanceOptions = {},
): Promise<number> {
  const maxKeys = options.pageSize ?? DEFAULT_MAINTENANCE_PAGE_SIZE
  let deleted = 0

  for (;;) {
    const page = await storage.list(bucket, { maxKeys, signal: options.signal })

    if (page.objects.length === 0) return deleted

    await storage.deleteMany(
      bucket,
      page.objects.map((o) => o.key),
      { signal: options.signal },
    )

    deleted += page.objects.length
  }
}
