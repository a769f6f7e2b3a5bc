import type { Clock, Milliseconds } from "@stowage/clock"
import { toAppError } from "@stowage/errors"
import type { Logger } from "@stowage/logger"
import {
  assertValidBucketName,
  type BucketStats,
  type BucketSummary,
  bucketStats,
  emptyBucket,
  type SignalOptions,
  type StorageBucket,
  StorageError,
  type StoragePort,
} from "@stowage/storage"
import { withDeadline } from "../core/deadline"
import type { OperationTimeouts } from "../core/timeouts"

export type BucketManagerDeps = {
  storage: StoragePort
  logger: Logger
  clock: Clock
  timeouts: OperationTimeouts
}

export class BucketManager {
  constructor(private readonly deps: BucketManagerDeps) {}

  /**
   * Fails with `bucket_already_exists` when the bucket is already there.
   * The check and the create are two calls, so two concurrent creates of
   * the same name can both pass the check; the backend then decides.
   */
  async createBucket(bucket: StorageBucket, options: SignalOptions = {}): Promise<void> {
    assertValidBucketName(bucket, "createBucket")

    await this.run("createBucket", bucket, this.deps.timeouts.requestMs, options, async (signal) => {
      if (await this.deps.storage.bucketExists(bucket, { signal })) {
        throw StorageError.bucketAlreadyExists({ operation: "createBucket", bucket })
      }

      await this.deps.storage.createBucket(bucket, { signal })
    })

    this.deps.logger.info("Bucket created", { operation: "createBucket", bucket })
  }

  async bucketExists(bucket: StorageBucket, options: SignalOptions = {}): Promise<boolean> {
    assertValidBucketName(bucket, "bucketExists")

    return this.run("bucketExists", bucket, this.deps.timeouts.requestMs, options, (signal) =>
      this.deps.storage.bucketExists(bucket, { signal }),
    )
  }

  /** Does not empty the bucket first; a non-empty bucket fails with `bucket_not_empty`. */
  async deleteBucket(bucket: StorageBucket, options: SignalOptions = {}): Promise<void> {
    assertValidBucketName(bucket, "deleteBucket")

    await this.run("deleteBucket", bucket, this.deps.timeouts.requestMs, options, (signal) =>
      this.deps.storage.deleteBucket(bucket, { signal }),
    )

    this.deps.logger.info("Bucket deleted", { operation: "deleteBucket", bucket })
  }

  /** Deletes every object and returns how many; 0 for an empty bucket. */
  async emptyBucket(bucket: StorageBucket, options: SignalOptions = {}): Promise<number> {
    assertValidBucketName(bucket, "emptyBucket")

    const deleted = await this.run(
      "emptyBucket",
      bucket,
      this.deps.timeouts.bulkMs,
      options,
      (signal) => emptyBucket(this.deps.storage, bucket, { signal }),
    )

    this.deps.logger.info("Bucket emptied", { operation: "emptyBucket", bucket, deleted })

    return deleted
  }

  async bucketStats(bucket: StorageBucket, options: SignalOptions = {}): Promise<BucketStats> {
    assertValidBucketName(bucket, "bucketStats")

    return this.run("bucketStats", bucket, this.deps.timeouts.bulkMs, options, (signal) =>
      bucketStats(this.deps.storage, bucket, { signal }),
    )
  }

  async listBuckets(options: SignalOptions = {}): Promise<BucketSummary[]> {
    try {
      return await withDeadline(
        this.deps.clock,
        {
          timeoutMs: this.deps.timeouts.requestMs,
          signal: options.signal,
          context: { operation: "listBuckets" },
        },
        (signal) => this.deps.storage.listBuckets({ signal }),
      )
    } catch (err) {
      this.deps.logger.error("Bucket operation failed", {
        operation: "listBuckets",
        err: toAppError(err, "unknown", { operation: "listBuckets" }),
      })
      throw err
    }
  }

  private async run<T>(
    operation: string,
    bucket: StorageBucket,
    timeoutMs: Milliseconds,
    options: SignalOptions,
    fn: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    try {
      return await withDeadline(
        this.deps.clock,
        { timeoutMs, signal: options.signal, context: { operation, bucket } },
        fn,
      )
    } catch (err) {
      this.deps.logger.error("Bucket operation failed", {
        operation,
        bucket,
        err: toAppError(err, "unknown", { operation, bucket }),
      })
      throw err
    }
  }
}
