import type { Seconds } from "@stowage/clock"
import type { Bytes } from "./storage-object"

export interface SignalOptions {
  /** Aborting rejects the call with `operation_aborted`. */
  signal?: AbortSignal | undefined
}

export interface PutOptions extends SignalOptions {
  contentType?: string | undefined
  metadata?: Record<string, string> | undefined
  /** Known body length, lets the backend skip buffering to size the request. */
  sizeInBytes?: Bytes | undefined
}

export interface ListOptions extends SignalOptions {
  /** Only objects whose key starts with this prefix */
  prefix?: string | undefined

  /** Max objects per page (backend caps apply, 1000 on S3) */
  maxKeys?: number | undefined

  /** Opaque token from a previous ListResult. Empty string means "from the start". */
  cursor?: string | undefined
}

export interface PresignedUrlOptions extends SignalOptions {
  /** 1..604800. Default: 900 */
  expiresInSeconds?: Seconds | undefined
  /** Upload URLs only: content type the uploader must send */
  contentType?: string | undefined
}
