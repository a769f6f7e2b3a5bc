import type {
  ObjectRef,
  StorageBucket,
  StorageData,
  StorageKey,
  StorageObject,
  StorageObjectMetadata,
} from "./storage-object"
import type {
  ListOptions,
  PresignedUrlOptions,
  PutOptions,
  SignalOptions,
} from "./storage-options"
import type { BucketSummary, ListResult, PutResult } from "./storage-result"

/**
 * Object store backend. Every failure is a StorageError; nothing is retried
 * internally.
 */
export interface StoragePort {
  /**
   * Upload an object, overwriting any existing one. A Readable passed as
   * `data` is destroyed once the write settles.
   */
  put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<PutResult>

  /**
   * Object metadata without body, or null if the object does not exist.
   * Throws `bucket_not_found` when the bucket itself is missing.
   */
  head(ref: ObjectRef, options?: SignalOptions): Promise<StorageObjectMetadata | null>

  /** Object with a streaming body. Throws `object_not_found` when missing. */
  get(ref: ObjectRef, options?: SignalOptions): Promise<StorageObject>

  /** Delete an object. Succeeds if it is already gone. */
  delete(ref: ObjectRef, options?: SignalOptions): Promise<void>

  /** Delete many objects in backend-sized batches. Missing keys are skipped. */
  deleteMany(bucket: StorageBucket, keys: StorageKey[], options?: SignalOptions): Promise<void>

  /** One page of objects. Follow `cursor` for the rest. */
  list(bucket: StorageBucket, options?: ListOptions): Promise<ListResult>

  getPresignedUploadUrl(ref: ObjectRef, options?: PresignedUrlOptions): Promise<URL>

  getPresignedDownloadUrl(ref: ObjectRef, options?: PresignedUrlOptions): Promise<URL>

  /** Stable, unsigned URL of an object; derived from bucket and key alone. */
  locate(ref: ObjectRef): URL

  bucketExists(bucket: StorageBucket, options?: SignalOptions): Promise<boolean>

  /** Throws `bucket_already_exists` when the name is taken. */
  createBucket(bucket: StorageBucket, options?: SignalOptions): Promise<void>

  /** Throws `bucket_not_found` or `bucket_not_empty`. Never empties the bucket. */
  deleteBucket(bucket: StorageBucket, options?: SignalOptions): Promise<void>

  listBuckets(options?: SignalOptions): Promise<BucketSummary[]>
}
