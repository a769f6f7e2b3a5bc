import { Readable } from "node:stream"
import {
  type _Object,
  type Bucket,
  type BucketLocationConstraint,
  CreateBucketCommand,
  DeleteBucketCommand,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  type S3Client,
} from "@aws-sdk/client-s3"
import { Upload } from "@aws-sdk/lib-storage"
import { getSignedUrl } from "@aws-sdk/s3-request-presigner"
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
import { isS3NotFound, translateS3Error } from "./s3-errors"

const S3_MAX_DELETE_BATCH_SIZE = 1000
const DEFAULT_DELETE_BATCH_SIZE = 1000
const S3_MAX_KEYS = 1000

export interface S3StorageDeps {
  client: S3Client
  clock: Clock
}

export interface S3StorageOptions {
  /** Every key is stored under this prefix; callers never see it. */
  keyspacePrefix: string
  deleteBatchSize?: number
  /** Locators become `<publicBaseUrl>/<bucket>/<key>` instead of `s3://<bucket>/<key>`. */
  publicBaseUrl?: string
  /** Sent with CreateBucket outside us-east-1. */
  locationConstraint?: BucketLocationConstraint
}

type ObjectResponse = {
  ContentLength?: number | undefined
  LastModified?: Date | undefined
  ETag?: string | undefined
  ContentType?: string | undefined
  Metadata?: Record<string, string> | undefined
  StorageClass?: string | undefined
}

export class S3Storage implements StoragePort {
  constructor(
    readonly deps: S3StorageDeps,
    readonly options: S3StorageOptions,
  ) {}

  async put(ref: ObjectRef, data: StorageData, options: PutOptions = {}): Promise<PutResult> {
    const prefixedRef = this.applyKeyspacePrefix(ref)
    const context = this.context("put", ref)

    const abortController = new AbortController()
    const onAbort = () => abortController.abort(options.signal?.reason)
    options.signal?.addEventListener("abort", onAbort, { once: true })

    try {
      if (options.signal?.aborted) {
        throw StorageError.operationAborted(context, options.signal.reason)
      }

      const upload = new Upload({
        client: this.deps.client,
        abortController,
        params: {
          Bucket: prefixedRef.bucket,
          Key: prefixedRef.key,
          Body: data,
          ...(options.contentType && { ContentType: options.contentType }),
          ...(options.metadata && { Metadata: options.metadata }),
          ...(options.sizeInBytes !== undefined && { ContentLength: options.sizeInBytes }),
        },
      })

      const result = await upload.done()

      return {
        ref,
        locator: this.locate(ref),
        ...("ETag" in result && result.ETag && { etag: result.ETag }),
      }
    } catch (err) {
      throw translateS3Error(err, context)
    } finally {
      options.signal?.removeEventListener("abort", onAbort)
      if (data instanceof Readable) data.destroy()
    }
  }

  async head(ref: ObjectRef, options: SignalOptions = {}): Promise<StorageObjectMetadata | null> {
    const prefixedRef = this.applyKeyspacePrefix(ref)

    try {
      const response = await this.deps.client.send(
        new HeadObjectCommand({
          Bucket: prefixedRef.bucket,
          Key: prefixedRef.key,
        }),
        this.sendOptions(options),
      )

      return this.toObjectMetadata(ref.key, response)
    } catch (err) {
      if (!isS3NotFound(err)) throw translateS3Error(err, this.context("head", ref))
    }

    // HeadObject has no body, so a missing bucket also comes back as a bare 404
    if (!(await this.bucketExists(ref.bucket, options))) {
      throw StorageError.bucketNotFound(this.context("head", ref))
    }

    return null
  }

  async get(ref: ObjectRef, options: SignalOptions = {}): Promise<StorageObject> {
    const prefixedRef = this.applyKeyspacePrefix(ref)
    const context = this.context("get", ref)

    try {
      const response = await this.deps.client.send(
        new GetObjectCommand({
          Bucket: prefixedRef.bucket,
          Key: prefixedRef.key,
        }),
        this.sendOptions(options),
      )

      if (!(response.Body instanceof Readable)) {
        throw StorageError.backendError(context, new TypeError("Response body is not a stream"))
      }

      return {
        ...this.toObjectMetadata(ref.key, response),
        body: response.Body,
      }
    } catch (err) {
      throw translateS3Error(err, context)
    }
  }

  async delete(ref: ObjectRef, options: SignalOptions = {}): Promise<void> {
    const prefixedRef = this.applyKeyspacePrefix(ref)

    try {
      await this.deps.client.send(
        new DeleteObjectCommand({
          Bucket: prefixedRef.bucket,
          Key: prefixedRef.key,
        }),
        this.sendOptions(options),
      )
    } catch (err) {
      if (isS3NotFound(err)) return
      throw translateS3Error(err, this.context("delete", ref))
    }
  }

  async deleteMany(
    bucket: StorageBucket,
    keys: StorageKey[],
    options: SignalOptions = {},
  ): Promise<void> {
    if (keys.length === 0) return

    const context: StorageErrorContext = { operation: "deleteMany", bucket }
    const batchSize = Math.min(
      this.options.deleteBatchSize ?? DEFAULT_DELETE_BATCH_SIZE,
      S3_MAX_DELETE_BATCH_SIZE,
    )

    for (const batch of this.chunk(keys, batchSize)) {
      let failed: number

      try {
        const response = await this.deps.client.send(
          new DeleteObjectsCommand({
            Bucket: bucket,
            Delete: {
              Objects: batch.map((key) => ({ Key: this.prefixKey(key) })),
              Quiet: true,
            },
          }),
          this.sendOptions(options),
        )

        failed = response.Errors?.length ?? 0
      } catch (err) {
        throw translateS3Error(err, context)
      }

      if (failed > 0) {
        throw new StorageError(`Failed to delete ${failed} of ${batch.length} objects`, {
          code: "backend_error",
          context: { ...context, failed },
        })
      }
    }
  }

  async list(bucket: StorageBucket, options: ListOptions = {}): Promise<ListResult> {
    const prefix = this.getListPrefix(options.prefix)
    const cursor = normalizeCursor(options.cursor)

    try {
      const response = await this.deps.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          ...(prefix && { Prefix: prefix }),
          ...(options.maxKeys !== undefined && { MaxKeys: Math.min(options.maxKeys, S3_MAX_KEYS) }),
          ...(cursor && { ContinuationToken: cursor }),
        }),
        this.sendOptions(options),
      )

      const next = response.IsTruncated ? normalizeCursor(response.NextContinuationToken) : undefined

      return {
        objects: this.mapListContents(response.Contents),
        ...(next && { cursor: next }),
      }
    } catch (err) {
      throw translateS3Error(err, { operation: "list", bucket })
    }
  }

  async getPresignedUploadUrl(ref: ObjectRef, options: PresignedUrlOptions = {}): Promise<URL> {
    const context = this.context("presignUpload", ref)
    const expiresIn = resolvePresignExpiry(options.expiresInSeconds, context)
    const prefixedRef = this.applyKeyspacePrefix(ref)

    const command = new PutObjectCommand({
      Bucket: prefixedRef.bucket,
      Key: prefixedRef.key,
      ...(options.contentType && { ContentType: options.contentType }),
    })

    try {
      return new URL(await getSignedUrl(this.deps.client, command, { expiresIn }))
    } catch (err) {
      throw translateS3Error(err, context)
    }
  }

  async getPresignedDownloadUrl(
    ref: ObjectRef,
    options: PresignedUrlOptions = {},
  ): Promise<URL> {
    const context = this.context("presignDownload", ref)
    const expiresIn = resolvePresignExpiry(options.expiresInSeconds, context)
    const prefixedRef = this.applyKeyspacePrefix(ref)

    const command = new GetObjectCommand({
      Bucket: prefixedRef.bucket,
      Key: prefixedRef.key,
    })

    try {
      return new URL(await getSignedUrl(this.deps.client, command, { expiresIn }))
    } catch (err) {
      throw translateS3Error(err, context)
    }
  }

  locate(ref: ObjectRef): URL {
    const prefixedRef = this.applyKeyspacePrefix(ref)
    const path = `${prefixedRef.bucket}/${encodeKeyPath(prefixedRef.key)}`

    if (!this.options.publicBaseUrl) return new URL(`s3://${path}`)

    return new URL(`${this.options.publicBaseUrl.replace(/\/+$/, "")}/${path}`)
  }

  async bucketExists(bucket: StorageBucket, options: SignalOptions = {}): Promise<boolean> {
    try {
      await this.deps.client.send(new HeadBucketCommand({ Bucket: bucket }), this.sendOptions(options))

      return true
    } catch (err) {
      const translated = translateS3Error(err, { operation: "bucketExists", bucket })

      if (translated.code === "bucket_not_found" || translated.code === "object_not_found") {
        return false
      }
      throw translated
    }
  }

  async createBucket(bucket: StorageBucket, options: SignalOptions = {}): Promise<void> {
    try {
      await this.deps.client.send(
        new CreateBucketCommand({
          Bucket: bucket,
          ...(this.options.locationConstraint && {
            CreateBucketConfiguration: { LocationConstraint: this.options.locationConstraint },
          }),
        }),
        this.sendOptions(options),
      )
    } catch (err) {
      throw translateS3Error(err, { operation: "createBucket", bucket })
    }
  }

  async deleteBucket(bucket: StorageBucket, options: SignalOptions = {}): Promise<void> {
    try {
      await this.deps.client.send(new DeleteBucketCommand({ Bucket: bucket }), this.sendOptions(options))
    } catch (err) {
      throw translateS3Error(err, { operation: "deleteBucket", bucket })
    }
  }

  async listBuckets(options: SignalOptions = {}): Promise<BucketSummary[]> {
    try {
      const response = await this.deps.client.send(new ListBucketsCommand({}), this.sendOptions(options))

      return (response.Buckets ?? [])
        .filter((b): b is Bucket & { Name: string } => Boolean(b.Name))
        .map((b) => ({
          name: b.Name,
          ...(b.CreationDate && { createdAt: b.CreationDate }),
        }))
    } catch (err) {
      throw translateS3Error(err, { operation: "listBuckets" })
    }
  }

  private context(operation: string, ref: ObjectRef): StorageErrorContext {
    return { operation, bucket: ref.bucket, key: ref.key }
  }

  private sendOptions(options: SignalOptions): { abortSignal?: AbortSignal } {
    return options.signal ? { abortSignal: options.signal } : {}
  }

  private applyKeyspacePrefix(ref: ObjectRef): ObjectRef {
    return { bucket: ref.bucket, key: this.prefixKey(ref.key) }
  }

  private normalizedKeyspace(): string {
    const prefix = this.options.keyspacePrefix
    if (!prefix) return ""

    return prefix.endsWith("/") ? prefix : `${prefix}/`
  }

  private prefixKey(key: string): string {
    return `${this.normalizedKeyspace()}${key}`
  }

  private stripKeyspacePrefix(key: string): string {
    const prefix = this.normalizedKeyspace()

    return prefix && key.startsWith(prefix) ? key.slice(prefix.length) : key
  }

  private getListPrefix(userPrefix?: string): string | undefined {
    const keyspace = this.normalizedKeyspace()

    if (userPrefix) return `${keyspace}${userPrefix}`
    if (keyspace) return keyspace

    return undefined
  }

  private toObjectMetadata(originalKey: string, response: ObjectResponse): StorageObjectMetadata {
    return {
      key: originalKey,
      sizeInBytes: response.ContentLength ?? 0,
      lastModified: response.LastModified ?? this.deps.clock.now(),
      ...(response.ETag && { etag: response.ETag }),
      ...(response.ContentType && { contentType: response.ContentType }),
      ...(response.Metadata && { metadata: response.Metadata }),
      ...(response.StorageClass && { storageClass: response.StorageClass }),
    }
  }

  private mapListContents(contents: _Object[] | undefined): StorageObjectMetadata[] {
    if (!contents) return []

    const keyspace = this.normalizedKeyspace()

    return contents
      .filter((obj): obj is _Object & { Key: string } => Boolean(obj.Key))
      .filter((obj) => !keyspace || obj.Key.startsWith(keyspace))
      .map((obj) => ({
        key: this.stripKeyspacePrefix(obj.Key),
        sizeInBytes: obj.Size ?? 0,
        lastModified: obj.LastModified ?? this.deps.clock.now(),
        ...(obj.ETag && { etag: obj.ETag }),
        ...(obj.StorageClass && { storageClass: obj.StorageClass }),
      }))
  }

  private chunk<T>(array: T[], size: number): T[][] {
    const chunks: T[][] = []
    for (let i = 0; i < array.length; i += size) {
      chunks.push(array.slice(i, i + size))
    }
    return chunks
  }
}

function encodeKeyPath(key: string): string {
  return key.split("/").map(encodeURIComponent).join("/")
}
