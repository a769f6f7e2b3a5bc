import type { Milliseconds, Seconds } from "@stowage/clock"
import { BaseError } from "@stowage/errors"
import type { StorageBucket, StorageKey } from "../ports/storage-object"

export type StorageErrorCode =
  | "invalid_bucket_name"
  | "bucket_already_exists"
  | "bucket_not_found"
  | "bucket_not_empty"
  | "object_not_found"
  | "operation_timeout"
  | "operation_aborted"
  | "backend_unavailable"
  | "backend_error"
  | "invalid_expiry"

export type StorageErrorContext = {
  operation: string
  bucket?: StorageBucket
  key?: StorageKey
}

export class StorageError extends BaseError<StorageErrorCode> {
  static invalidBucketName(
    context: StorageErrorContext & { bucket: StorageBucket },
    rule: string,
    reason: string,
  ): StorageError {
    return new StorageError(`Invalid bucket name: ${reason}`, {
      code: "invalid_bucket_name",
      context: { ...context, rule },
    })
  }

  static bucketAlreadyExists(context: StorageErrorContext, cause?: unknown): StorageError {
    return new StorageError("Bucket already exists", {
      code: "bucket_already_exists",
      context,
      ...(cause !== undefined && { cause }),
    })
  }

  static bucketNotFound(context: StorageErrorContext, cause?: unknown): StorageError {
    return new StorageError("Bucket not found", {
      code: "bucket_not_found",
      context,
      ...(cause !== undefined && { cause }),
    })
  }

  static bucketNotEmpty(context: StorageErrorContext, cause?: unknown): StorageError {
    return new StorageError("Bucket is not empty", {
      code: "bucket_not_empty",
      context,
      ...(cause !== undefined && { cause }),
    })
  }

  static objectNotFound(context: StorageErrorContext, cause?: unknown): StorageError {
    return new StorageError("Object not found", {
      code: "object_not_found",
      context,
      ...(cause !== undefined && { cause }),
    })
  }

  static operationTimeout(
    context: StorageErrorContext,
    timeoutMs: Milliseconds,
    cause?: unknown,
  ): StorageError {
    return new StorageError(`Operation timed out after ${timeoutMs}ms`, {
      code: "operation_timeout",
      context: { ...context, timeoutMs },
      isRetryable: true,
      ...(cause !== undefined && { cause }),
    })
  }

  static operationAborted(context: StorageErrorContext, cause?: unknown): StorageError {
    return new StorageError("Operation aborted", {
      code: "operation_aborted",
      context,
      ...(cause !== undefined && { cause }),
    })
  }

  static backendUnavailable(context: StorageErrorContext, cause?: unknown): StorageError {
    return new StorageError("Storage backend unavailable", {
      code: "backend_unavailable",
      context,
      isRetryable: true,
      ...(cause !== undefined && { cause }),
    })
  }

  static backendError(context: StorageErrorContext, cause?: unknown): StorageError {
    return new StorageError("Storage backend error", {
      code: "backend_error",
      context,
      ...(cause !== undefined && { cause }),
    })
  }

  static invalidExpiry(
    context: StorageErrorContext,
    expiresInSeconds: Seconds,
    bounds: { min: Seconds; max: Seconds },
  ): StorageError {
    return new StorageError(
      `Presigned URL expiry must be between ${bounds.min} and ${bounds.max} seconds`,
      {
        code: "invalid_expiry",
        context: { ...context, expiresInSeconds },
      },
    )
  }
}

export function isStorageError(err: unknown, code?: StorageErrorCode): err is StorageError {
  return err instanceof StorageError && (code === undefined || err.code === code)
}
