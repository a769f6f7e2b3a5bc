import { BucketLocationConstraint, type S3Client } from "@aws-sdk/client-s3"
import type { Clock } from "@stowage/clock"
import type { StoragePort } from "../ports/storage"
import type { StorageBucket } from "../ports/storage-object"
import { MemoryStorage } from "./memory-storage"
import { S3Storage } from "./s3-storage"

export interface CreateMemoryStorageOptions {
  clock: Clock
  buckets?: Iterable<StorageBucket>
}

export function createMemoryStorage(options: CreateMemoryStorageOptions): StoragePort {
  return new MemoryStorage(
    { clock: options.clock },
    { ...(options.buckets !== undefined && { buckets: options.buckets }) },
  )
}

export interface CreateS3StorageOptions {
  client: S3Client
  clock: Clock
  keyspacePrefix: string
  deleteBatchSize?: number
  publicBaseUrl?: string
  /** Region new buckets are created in; us-east-1 needs no constraint. */
  region?: string
}

/** The CreateBucket location constraint for `region`, if S3 expects one. */
export function toLocationConstraint(region: string): BucketLocationConstraint | undefined {
  if (region === "us-east-1") return undefined

  return Object.values(BucketLocationConstraint).find((constraint) => constraint === region)
}

export function createS3Storage(options: CreateS3StorageOptions): StoragePort {
  const locationConstraint =
    options.region === undefined ? undefined : toLocationConstraint(options.region)

  return new S3Storage(
    { client: options.client, clock: options.clock },
    {
      keyspacePrefix: options.keyspacePrefix,
      ...(options.deleteBatchSize !== undefined && {
        deleteBatchSize: options.deleteBatchSize,
      }),
      ...(options.publicBaseUrl !== undefined && { publicBaseUrl: options.publicBaseUrl }),
      ...(locationConstraint !== undefined && { locationConstraint }),
    },
  )
}
