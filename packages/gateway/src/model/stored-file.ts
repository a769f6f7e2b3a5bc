import type { MediaType } from "@stowage/media"
import type { Bytes, ObjectRef, StorageBucket, StorageKey } from "@stowage/storage"

/** A file the backend has confirmed. Never changes; new content gets a new key. */
export type StoredFile = {
  bucket: StorageBucket
  key: StorageKey
  sizeInBytes: Bytes
  contentType: MediaType
  locator: URL
  lastModified: Date
  etag?: string
}

export type ObjectSummary = {
  key: StorageKey
  sizeInBytes: Bytes
  /** e.g. "1.5 KB" */
  size: string
  /** Lower-cased, without the dot; "" when the key has none */
  extension: string
  storageClass: string
  lastModified: Date
  etag?: string
}

export type PaginatedListing = {
  items: ObjectSummary[]
  /** Absent on the final page */
  cursor?: string
}

export type ListQuery = {
  /** Keep only keys with this extension ("png" or ".png"), applied after the backend page */
  extension?: string | undefined
  prefix?: string | undefined
  cursor?: string | undefined
  limit?: number | undefined
}

export type PresignedUrl = {
  url: URL
  ref: ObjectRef
  expiresAt: Date
}
