export { S3Client } from "@aws-sdk/client-s3"
export {
  type CreateMemoryStorageOptions,
  type CreateS3StorageOptions,
  createMemoryStorage,
  createS3Storage,
  toLocationConstraint,
} from "./adapters/create"
export {
  MemoryStorage,
  type MemoryStorageDeps,
  type MemoryStorageOptions,
} from "./adapters/memory-storage"
export { translateS3Error } from "./adapters/s3-errors"
export { S3Storage, type S3StorageDeps, type S3StorageOptions } from "./adapters/s3-storage"
export {
  bucketStats,
  DEFAULT_MAINTENANCE_PAGE_SIZE,
  emptyBucket,
  type MaintenanceOptions,
} from "./core/bucket-maintenance"
export { normalizeCursor, paginate, walkObjects } from "./core/paginate"
export {
  DEFAULT_PRESIGN_EXPIRY_SECONDS,
  isValidPresignExpiry,
  MAX_PRESIGN_EXPIRY_SECONDS,
  MIN_PRESIGN_EXPIRY_SECONDS,
  resolvePresignExpiry,
} from "./core/presign"
export {
  isStorageError,
  StorageError,
  type StorageErrorCode,
  type StorageErrorContext,
} from "./core/storage.errors"
export {
  assertValidBucketName,
  type BucketNameRule,
  type BucketNameViolation,
  MAX_BUCKET_NAME_LENGTH,
  MIN_BUCKET_NAME_LENGTH,
  validateBucketName,
} from "./core/validation/bucket-name"
export type { StoragePort } from "./ports/storage"
export type {
  Bytes,
  Metadata,
  ObjectRef,
  StorageBucket,
  StorageData,
  StorageKey,
  StorageObject,
  StorageObjectMetadata,
} from "./ports/storage-object"
export type {
  ListOptions,
  PresignedUrlOptions,
  PutOptions,
  SignalOptions,
} from "./ports/storage-options"
export type {
  BucketStats,
  BucketSummary,
  ListResult,
  PutResult,
} from "./ports/storage-result"
