import type { Readable } from "node:stream"

export type StorageData = Readable | Buffer | Uint8Array

export type Bytes = number

/**
 * Unique identifier for an object within a bucket, e.g.
 * "0190f5a2-7c1e-7d4a-9b3e-2f6a8c1d4e5f.png".
 */
export type StorageKey = string

/**
 * Name of a storage bucket. See validateBucketName for the accepted form.
 */
export type StorageBucket = string

/**
 * Pointer to a specific object in storage.
 */
export interface ObjectRef {
  bucket: StorageBucket
  key: StorageKey
}

export type Metadata = {
  contentType?: string
  metadata?: Record<string, string>
  etag?: string
  storageClass?: string
}

/**
 * Object metadata returned by head() and list().
 * Note: contentType and metadata are usually absent from list() results.
 */
export type StorageObjectMetadata = Metadata & {
  key: StorageKey
  sizeInBytes: Bytes
  lastModified: Date
}

/**
 * Object with a streaming body, returned by get(). The caller owns `body`
 * and must consume or destroy it.
 */
export interface StorageObject extends StorageObjectMetadata {
  body: Readable
}
