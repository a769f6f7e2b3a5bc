import { StorageError, type StorageErrorContext } from "../core/storage.errors"

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EPIPE",
])

function stringField(value: unknown, field: string): string | undefined {
  if (typeof value !== "object" || value === null || !(field in value)) return undefined

  const raw: unknown = Reflect.get(value, field)

  return typeof raw === "string" ? raw : undefined
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("$metadata" in err)) return undefined

  const metadata: unknown = err.$metadata
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) {
    return undefined
  }

  const status: unknown = metadata.httpStatusCode

  return typeof status === "number" ? status : undefined
}

function isConnectionError(err: unknown): boolean {
  const code = stringField(err, "code")
  if (code !== undefined && CONNECTION_ERROR_CODES.has(code)) return true

  const cause: unknown = typeof err === "object" && err !== null && "cause" in err ? err.cause : undefined
  const causeCode = stringField(cause, "code")

  return causeCode !== undefined && CONNECTION_ERROR_CODES.has(causeCode)
}

export function isS3NotFound(err: unknown): boolean {
  const name = stringField(err, "name")

  return name === "NotFound" || name === "NoSuchKey"
}

/**
 * Maps an AWS SDK (or socket) failure onto the storage error vocabulary.
 * StorageErrors pass through untouched.
 */
export function translateS3Error(err: unknown, context: StorageErrorContext): StorageError {
  if (err instanceof StorageError) return err

  switch (stringField(err, "name")) {
    case "AbortError":
      return StorageError.operationAborted(context, err)
    case "NoSuchBucket":
      return StorageError.bucketNotFound(context, err)
    case "NoSuchKey":
    case "NotFound":
      return StorageError.objectNotFound(context, err)
    case "BucketAlreadyExists":
    case "BucketAlreadyOwnedByYou":
      return StorageError.bucketAlreadyExists(context, err)
    case "BucketNotEmpty":
      return StorageError.bucketNotEmpty(context, err)
    case "TimeoutError":
      return StorageError.backendUnavailable(context, err)
  }

  if (isConnectionError(err)) {
    return StorageError.backendUnavailable(context, err)
  }

  const status = httpStatusOf(err)
  if (status !== undefined && status >= 500) {
    return StorageError.backendUnavailable(context, err)
  }

  return StorageError.backendError(context, err)
}
