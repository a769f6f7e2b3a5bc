import type { Clock, Seconds } from "@stowage/clock"
import { toAppError } from "@stowage/errors"
import { extensionOf, type ObjectKeyFactory } from "@stowage/id"
import type { Logger } from "@stowage/logger"
import {
  MediaTypes,
  type MediaTypePolicy,
  SNIFF_WINDOW_BYTES,
  sniffMediaType,
} from "@stowage/media"
import {
  assertValidBucketName,
  normalizeCursor,
  type ObjectRef,
  type SignalOptions,
  type StorageBucket,
  type StorageKey,
  type StorageObject,
  type StorageObjectMetadata,
  type StoragePort,
} from "@stowage/storage"
import { withDeadline } from "../core/deadline"
import { allOrNothing } from "../core/fan-out"
import type { OperationTimeouts } from "../core/timeouts"
import { assertValidListLimit } from "../core/validation/list-limit"
import { assertValidObjectKey } from "../core/validation/object-key"
import { formatBytes } from "../lib/format-bytes"
import { GatewayError } from "../model/gateway.errors"
import type {
  ListQuery,
  ObjectSummary,
  PaginatedListing,
  PresignedUrl,
  StoredFile,
} from "../model/stored-file"
import { closeBody, isSeekableBody } from "../model/upload-body"
import type { UploadRequest } from "../model/upload-request"

const DEFAULT_STORAGE_CLASS = "STANDARD"

export type FileOrchestratorDeps = {
  storage: StoragePort
  logger: Logger
  clock: Clock
  keys: ObjectKeyFactory
  mediaPolicy: MediaTypePolicy
  timeouts: OperationTimeouts
  /** Lifetime of every presigned URL handed out; callers cannot choose it. */
  presignExpirySeconds: Seconds
  /** Page size when a list query gives no limit */
  listPageSize: number
}

/**
 * Validate, name, persist: the upload and download policy in front of a
 * StoragePort. Every call is bounded by its timeout and the caller's signal;
 * nothing is retried.
 */
export class FileOrchestrator {
  constructor(private readonly deps: FileOrchestratorDeps) {}

  async uploadOne(
    bucket: StorageBucket,
    request: UploadRequest,
    options: SignalOptions = {},
  ): Promise<StoredFile> {
    const file = await this.store(bucket, request, options.signal)

    request.complete(file)

    return file
  }

  /**
   * Uploads every request concurrently. If one fails the others are
   * cancelled and the first failure is thrown once all bodies are closed;
   * no request is marked complete. Objects written before the failure stay
   * in the bucket.
   */
  async uploadMany(
    bucket: StorageBucket,
    requests: readonly UploadRequest[],
    options: SignalOptions = {},
  ): Promise<StoredFile[]> {
    try {
      assertValidBucketName(bucket, "uploadMany")
    } catch (err) {
      await Promise.all(requests.map((request) => closeBody(request.body)))
      throw err
    }

    const files = await allOrNothing(requests, options.signal, (request, signal) =>
      this.store(bucket, request, signal),
    )

    requests.forEach((request, index) => {
      const file = files[index]
      if (file) request.complete(file)
    })

    this.deps.logger.info("Batch uploaded", {
      operation: "uploadMany",
      bucket,
      count: files.length,
    })

    return files
  }

  /** Opens the object for reading. The deadline covers opening only; the caller closes `body`. */
  async downloadOne(
    bucket: StorageBucket,
    key: StorageKey,
    options: SignalOptions = {},
  ): Promise<StorageObject> {
    const ref = this.validRef(bucket, key, "download")

    return this.observe("download", ref, () =>
      withDeadline(
        this.deps.clock,
        {
          timeoutMs: this.deps.timeouts.requestMs,
          signal: options.signal,
          context: { operation: "download", ...ref },
        },
        (signal) => this.deps.storage.get(ref, { signal }),
      ),
    )
  }

  async statObject(
    bucket: StorageBucket,
    key: StorageKey,
    options: SignalOptions = {},
  ): Promise<StoredFile | null> {
    const ref = this.validRef(bucket, key, "stat")

    const meta = await this.observe("stat", ref, () =>
      withDeadline(
        this.deps.clock,
        {
          timeoutMs: this.deps.timeouts.requestMs,
          signal: options.signal,
          context: { operation: "stat", ...ref },
        },
        (signal) => this.deps.storage.head(ref, { signal }),
      ),
    )

    return meta ? this.toStoredFile(ref, meta) : null
  }

  /** Download URL valid for the configured presign expiry. */
  async presignedUrl(
    bucket: StorageBucket,
    key: StorageKey,
    options: SignalOptions = {},
  ): Promise<PresignedUrl> {
    const ref = this.validRef(bucket, key, "presignDownload")
    const expiresInSeconds = this.deps.presignExpirySeconds

    const url = await this.observe("presignDownload", ref, () =>
      withDeadline(
        this.deps.clock,
        {
          timeoutMs: this.deps.timeouts.requestMs,
          signal: options.signal,
          context: { operation: "presignDownload", ...ref },
        },
        (signal) => this.deps.storage.getPresignedDownloadUrl(ref, { expiresInSeconds, signal }),
      ),
    )

    return { url, ref, expiresAt: this.expiresAt(expiresInSeconds) }
  }

  /**
   * Upload URL for a client that sends the bytes itself, under a fresh key.
   * Content is not sniffed on this path.
   */
  async presignedUploadUrl(
    bucket: StorageBucket,
    originalName: string,
    options: SignalOptions = {},
  ): Promise<PresignedUrl> {
    assertValidBucketName(bucket, "presignUpload")

    const ref: ObjectRef = { bucket, key: this.deps.keys.forFile(originalName) }
    const expiresInSeconds = this.deps.presignExpirySeconds

    const url = await this.observe("presignUpload", ref, () =>
      withDeadline(
        this.deps.clock,
        {
          timeoutMs: this.deps.timeouts.requestMs,
          signal: options.signal,
          context: { operation: "presignUpload", ...ref },
        },
        (signal) => this.deps.storage.getPresignedUploadUrl(ref, { expiresInSeconds, signal }),
      ),
    )

    return { url, ref, expiresAt: this.expiresAt(expiresInSeconds) }
  }

  /**
   * One backend page. The extension filter runs on that page only, so a
   * filtered page may be short or empty while `cursor` still points further.
   */
  async list(
    bucket: StorageBucket,
    query: ListQuery = {},
    options: SignalOptions = {},
  ): Promise<PaginatedListing> {
    assertValidBucketName(bucket, "list")

    const limit = query.limit ?? this.deps.listPageSize
    assertValidListLimit(limit)

    const extension = query.extension?.replace(/^\./, "").toLowerCase()

    const page = await this.observe("list", { bucket }, () =>
      withDeadline(
        this.deps.clock,
        {
          timeoutMs: this.deps.timeouts.requestMs,
          signal: options.signal,
          context: { operation: "list", bucket },
        },
        (signal) =>
          this.deps.storage.list(bucket, {
            prefix: query.prefix,
            maxKeys: limit,
            cursor: normalizeCursor(query.cursor),
            signal,
          }),
      ),
    )

    const items = page.objects
      .map((object) => this.toSummary(object))
      .filter((item) => !extension || item.extension === extension)
    const cursor = normalizeCursor(page.cursor)

    return {
      items,
      ...(cursor !== undefined && { cursor }),
    }
  }

  /** Succeeds whether or not the object exists. */
  async deleteOne(
    bucket: StorageBucket,
    key: StorageKey,
    options: SignalOptions = {},
  ): Promise<void> {
    const ref = this.validRef(bucket, key, "delete")

    await this.observe("delete", ref, () =>
      withDeadline(
        this.deps.clock,
        {
          timeoutMs: this.deps.timeouts.deleteMs,
          signal: options.signal,
          context: { operation: "delete", ...ref },
        },
        (signal) => this.deps.storage.delete(ref, { signal }),
      ),
    )

    this.deps.logger.info("File deleted", { operation: "delete", ...ref })
  }

  async deleteMany(
    bucket: StorageBucket,
    keys: readonly StorageKey[],
    options: SignalOptions = {},
  ): Promise<void> {
    assertValidBucketName(bucket, "deleteMany")
    for (const key of keys) assertValidObjectKey(key, "deleteMany")

    await this.observe("deleteMany", { bucket }, () =>
      withDeadline(
        this.deps.clock,
        {
          timeoutMs: this.deps.timeouts.deleteMs,
          signal: options.signal,
          context: { operation: "deleteMany", bucket },
        },
        (signal) => this.deps.storage.deleteMany(bucket, [...keys], { signal }),
      ),
    )

    this.deps.logger.info("Files deleted", {
      operation: "deleteMany",
      bucket,
      count: keys.length,
    })
  }

  /** Validate, sniff, name, put. Closes the request body on every path. */
  private async store(
    bucket: StorageBucket,
    request: UploadRequest,
    signal: AbortSignal | undefined,
  ): Promise<StoredFile> {
    const { body } = request

    try {
      assertValidBucketName(bucket, "upload")

      if (!isSeekableBody(body)) throw GatewayError.unseekableBody(request.originalName)

      const head = await body.read(SNIFF_WINDOW_BYTES)
      await body.rewind()

      const contentType = sniffMediaType(head)
      this.deps.mediaPolicy.assertAllowed(contentType)

      const ref: ObjectRef = { bucket, key: this.deps.keys.forFile(request.originalName) }

      const file = await this.observe("upload", ref, () =>
        withDeadline(
          this.deps.clock,
          {
            timeoutMs: this.deps.timeouts.uploadMs,
            signal,
            context: { operation: "upload", ...ref },
          },
          async (deadlineSignal) => {
            const put = await this.deps.storage.put(ref, body.stream(), {
              contentType,
              sizeInBytes: body.sizeInBytes,
              signal: deadlineSignal,
            })
            const meta = await this.readBack(ref, deadlineSignal)
            const etag = meta?.etag ?? put.etag

            return {
              bucket,
              key: ref.key,
              contentType,
              locator: put.locator,
              sizeInBytes: meta?.sizeInBytes ?? body.sizeInBytes,
              lastModified: meta?.lastModified ?? this.deps.clock.now(),
              ...(etag !== undefined && { etag }),
            }
          },
        ),
      )

      this.deps.logger.info("File uploaded", {
        operation: "upload",
        bucket,
        key: file.key,
        contentType,
        sizeInBytes: file.sizeInBytes,
      })

      return file
    } finally {
      await closeBody(body)
    }
  }

  /** The object is already stored; a failed read-back falls back to what put reported. */
  private async readBack(
    ref: ObjectRef,
    signal: AbortSignal,
  ): Promise<StorageObjectMetadata | null> {
    try {
      return await this.deps.storage.head(ref, { signal })
    } catch (err) {
      if (signal.aborted) throw err

      this.deps.logger.warn("Uploaded file metadata unavailable", {
        operation: "upload",
        ...ref,
        err: toAppError(err, "unknown", { operation: "head", ...ref }),
      })

      return null
    }
  }

  private async observe<T>(
    operation: string,
    target: { bucket: StorageBucket; key?: StorageKey },
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      this.deps.logger.error("File operation failed", {
        operation,
        ...target,
        err: toAppError(err, "unknown", { operation, ...target }),
      })
      throw err
    }
  }

  private validRef(bucket: StorageBucket, key: StorageKey, operation: string): ObjectRef {
    assertValidBucketName(bucket, operation)
    assertValidObjectKey(key, operation)

    return { bucket, key }
  }

  private expiresAt(expiresInSeconds: Seconds): Date {
    return new Date(this.deps.clock.nowMs() + expiresInSeconds * 1000)
  }

  private toStoredFile(ref: ObjectRef, meta: StorageObjectMetadata): StoredFile {
    return {
      bucket: ref.bucket,
      key: ref.key,
      sizeInBytes: meta.sizeInBytes,
      contentType: meta.contentType ?? MediaTypes.OctetStream,
      locator: this.deps.storage.locate(ref),
      lastModified: meta.lastModified,
      ...(meta.etag !== undefined && { etag: meta.etag }),
    }
  }

  private toSummary(object: StorageObjectMetadata): ObjectSummary {
    return {
      key: object.key,
      sizeInBytes: object.sizeInBytes,
      size: formatBytes(object.sizeInBytes),
      extension: extensionOf(object.key),
      storageClass: object.storageClass ?? DEFAULT_STORAGE_CLASS,
      lastModified: object.lastModified,
      ...(object.etag !== undefined && { etag: object.etag }),
    }
  }
}
