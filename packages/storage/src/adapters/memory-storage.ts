import { createHash } from "node:crypto"
import { Readable } from "node:stream"
import type { Clock } from "@stowage/clock"
import { normalizeCursor } from "../core/paginate"
import { resolvePresignExpiry } from "../core/presign"
import { StorageError, type StorageErrorContext } from "../core/storage.errors"
import type { StoragePort } from "../ports/storage"
import type {
  ObjectRef,
  StorageBucket,
  StorageData,
  StorageKey,
  StorageObject,
  StorageObjectMetadata,
} from "../ports/storage-object"
import type {
  ListOptions,
  PresignedUrlOptions,
  PutOptions,
  SignalOptions,
} from "../ports/storage-options"
import type { BucketSummary, ListResult, PutResult } from "../ports/storage-result"

const DEFAULT_MAX_KEYS = 1000
const STORAGE_CLASS = "STANDARD"

/** S3 lists keys in UTF-8 byte order, not UTF-16 code unit order. */
function compareKeys(a: StorageKey, b: StorageKey): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"))
}

interface StoredObject {
  data: Buffer
  etag: string
  contentType?: string
  metadata?: Record<string, string>
  lastModified: Date
}

interface MemoryBucket {
  createdAt: Date
  objects: Map<StorageKey, StoredObject>
}

export interface MemoryStorageDeps {
  clock: Clock
}

export interface MemoryStorageOptions {
  /** Buckets that exist from the start. Any other bucket must be created first. */
  buckets?: Iterable<StorageBucket>
}

/**
 * In-process backend with S3 semantics: explicit buckets, key-ordered
 * listing with opaque cursors, and `memory://` presigned URLs that echo
 * their expiry as `expiresIn`.
 */
export class MemoryStorage implements StoragePort {
  private readonly buckets = new Map<StorageBucket, MemoryBucket>()

  constructor(
    private readonly deps: MemoryStorageDeps,
    options: MemoryStorageOptions = {},
  ) {
    for (const bucket of options.buckets ?? []) {
      this.buckets.set(bucket, { createdAt: deps.clock.now(), objects: new Map() })
    }
  }

  async put(ref: ObjectRef, data: StorageData, options: PutOptions = {}): Promise<PutResult> {
    const context = this.context("put", ref)

    try {
      const bucket = this.requireBucket(ref.bucket, context)
      const buffer = await this.toBuffer(data, options.signal, context)
      const etag = this.computeEtag(buffer)

      this.throwIfAborted(options.signal, context)

      bucket.objects.set(ref.key, {
        data: buffer,
        etag,
        lastModified: this.deps.clock.now(),
        ...(options.contentType && { contentType: options.contentType }),
        ...(options.metadata && { metadata: { ...options.metadata } }),
      })

      return { ref, locator: this.locate(ref), etag }
    } finally {
      if (data instanceof Readable) data.destroy()
    }
  }

  async head(ref: ObjectRef, options: SignalOptions = {}): Promise<StorageObjectMetadata | null> {
    const context = this.context("head", ref)
    this.throwIfAborted(options.signal, context)

    const stored = this.requireBucket(ref.bucket, context).objects.get(ref.key)
    if (!stored) return null

    return this.toObjectMetadata(ref.key, stored)
  }

  async get(ref: ObjectRef, options: SignalOptions = {}): Promise<StorageObject> {
    const context = this.context("get", ref)
    this.throwIfAborted(options.signal, context)

    const stored = this.requireBucket(ref.bucket, context).objects.get(ref.key)
    if (!stored) throw StorageError.objectNotFound(context)

    return {
      ...this.toObjectMetadata(ref.key, stored),
      body: Readable.from([Buffer.from(stored.data)]),
    }
  }

  async delete(ref: ObjectRef, options: SignalOptions = {}): Promise<void> {
    const context = this.context("delete", ref)
    this.throwIfAborted(options.signal, context)

    this.requireBucket(ref.bucket, context).objects.delete(ref.key)
  }

  async deleteMany(
    bucket: StorageBucket,
    keys: StorageKey[],
    options: SignalOptions = {},
  ): Promise<void> {
    const context: StorageErrorContext = { operation: "deleteMany", bucket }
    this.throwIfAborted(options.signal, context)

    const objects = this.requireBucket(bucket, context).objects

    for (const key of keys) {
      objects.delete(key)
    }
  }

  async list(bucket: StorageBucket, options: ListOptions = {}): Promise<ListResult> {
    const context: StorageErrorContext = { operation: "list", bucket }
    this.throwIfAborted(options.signal, context)

    const objects = this.requireBucket(bucket, context).objects
    const prefix = options.prefix ?? ""
    const maxKeys = Math.max(1, Math.min(options.maxKeys ?? DEFAULT_MAX_KEYS, DEFAULT_MAX_KEYS))
    const after = this.decodeCursor(normalizeCursor(options.cursor))

    const keys = [...objects.keys()]
      .filter((key) => key.startsWith(prefix))
      .sort(compareKeys)
      .filter((key) => after === undefined || compareKeys(key, after) > 0)

    const pageKeys = keys.slice(0, maxKeys)
    const lastKey = pageKeys.at(-1)

    const page: StorageObjectMetadata[] = []
    for (const key of pageKeys) {
      const stored = objects.get(key)
      if (stored) page.push(this.toObjectMetadata(key, stored))
    }

    return {
      objects: page,
      ...(keys.length > maxKeys && lastKey !== undefined && { cursor: this.encodeCursor(lastKey) }),
    }
  }

  async getPresignedUploadUrl(ref: ObjectRef, options: PresignedUrlOptions = {}): Promise<URL> {
    const context = this.context("presignUpload", ref)
    this.throwIfAborted(options.signal, context)

    const expiresIn = resolvePresignExpiry(options.expiresInSeconds, context)
    this.requireBucket(ref.bucket, context)

    const url = this.locate(ref)
    url.searchParams.set("action", "upload")
    url.searchParams.set("expiresIn", String(expiresIn))
    if (options.contentType) url.searchParams.set("contentType", options.contentType)

    return url
  }

  async getPresignedDownloadUrl(
    ref: ObjectRef,
    options: PresignedUrlOptions = {},
  ): Promise<URL> {
    const context = this.context("presignDownload", ref)
    this.throwIfAborted(options.signal, context)

    const expiresIn = resolvePresignExpiry(options.expiresInSeconds, context)
    this.requireBucket(ref.bucket, context)

    const url = this.locate(ref)
    url.searchParams.set("action", "download")
    url.searchParams.set("expiresIn", String(expiresIn))

    return url
  }

  locate(ref: ObjectRef): URL {
    const path = ref.key.split("/").map(encodeURIComponent).join("/")

    return new URL(`memory://${ref.bucket}/${path}`)
  }

  async bucketExists(bucket: StorageBucket, options: SignalOptions = {}): Promise<boolean> {
    this.throwIfAborted(options.signal, { operation: "bucketExists", bucket })

    return this.buckets.has(bucket)
  }

  async createBucket(bucket: StorageBucket, options: SignalOptions = {}): Promise<void> {
    const context: StorageErrorContext = { operation: "createBucket", bucket }
    this.throwIfAborted(options.signal, context)

    if (this.buckets.has(bucket)) throw StorageError.bucketAlreadyExists(context)

    this.buckets.set(bucket, { createdAt: this.deps.clock.now(), objects: new Map() })
  }

  async deleteBucket(bucket: StorageBucket, options: SignalOptions = {}): Promise<void> {
    const context: StorageErrorContext = { operation: "deleteBucket", bucket }
    this.throwIfAborted(options.signal, context)

    const existing = this.requireBucket(bucket, context)
    if (existing.objects.size > 0) throw StorageError.bucketNotEmpty(context)

    this.buckets.delete(bucket)
  }

  async listBuckets(options: SignalOptions = {}): Promise<BucketSummary[]> {
    this.throwIfAborted(options.signal, { operation: "listBuckets" })

    return [...this.buckets.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, bucket]) => ({ name, createdAt: bucket.createdAt }))
  }

  private context(operation: string, ref: ObjectRef): StorageErrorContext {
    return { operation, bucket: ref.bucket, key: ref.key }
  }

  private requireBucket(bucket: StorageBucket, context: StorageErrorContext): MemoryBucket {
    const existing = this.buckets.get(bucket)
    if (!existing) throw StorageError.bucketNotFound(context)

    return existing
  }

  private throwIfAborted(signal: AbortSignal | undefined, context: StorageErrorContext): void {
    if (signal?.aborted) throw StorageError.operationAborted(context, signal.reason)
  }

  private toObjectMetadata(key: string, stored: StoredObject): StorageObjectMetadata {
    return {
      key,
      sizeInBytes: stored.data.length,
      lastModified: stored.lastModified,
      etag: stored.etag,
      storageClass: STORAGE_CLASS,
      ...(stored.contentType && { contentType: stored.contentType }),
      ...(stored.metadata && { metadata: { ...stored.metadata } }),
    }
  }

  private encodeCursor(key: StorageKey): string {
    return Buffer.from(key, "utf8").toString("base64url")
  }

  private decodeCursor(cursor: string | undefined): StorageKey | undefined {
    return cursor === undefined ? undefined : Buffer.from(cursor, "base64url").toString("utf8")
  }

  private async toBuffer(
    data: StorageData,
    signal: AbortSignal | undefined,
    context: StorageErrorContext,
  ): Promise<Buffer> {
    if (!(data instanceof Readable)) return Buffer.from(data)

    const chunks: Buffer[] = []
    for await (const chunk of data) {
      this.throwIfAborted(signal, context)
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
    }

    return Buffer.concat(chunks)
  }

  private computeEtag(data: Buffer): string {
    return `"${createHash("md5").update(data).digest("hex")}"`
  }
}
