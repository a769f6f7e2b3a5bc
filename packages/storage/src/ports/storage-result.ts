import type { Bytes, ObjectRef, StorageBucket, StorageObjectMetadata } from "./storage-object"

export interface ListResult {
  /** One page of objects, in backend order */
  objects: StorageObjectMetadata[]

  /** Opaque token for the next page. Undefined when this is the last page. */
  cursor?: string
}

export interface PutResult {
  ref: ObjectRef
  /** Where the object lives, see StoragePort.locate */
  locator: URL
  etag?: string
}

export interface BucketSummary {
  name: StorageBucket
  createdAt?: Date
}

export interface BucketStats {
  bucket: StorageBucket
  objectCount: number
  totalSizeInBytes: Bytes
}
