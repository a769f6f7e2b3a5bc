import { BaseError } from "@stowage/errors"

export type GatewayErrorCode = "unseekable_body" | "invalid_object_key" | "invalid_list_limit"

export class GatewayError extends BaseError<GatewayErrorCode> {
  static unseekableBody(originalName: string): GatewayError {
    return new GatewayError("Upload body must support seeking back to the start", {
      code: "unseekable_body",
      context: { originalName },
      isRetryable: false,
    })
  }

  static invalidObjectKey(operation: string, reason: string): GatewayError {
    return new GatewayError(`Invalid object key: ${reason}`, {
      code: "invalid_object_key",
      context: { operation },
      isRetryable: false,
    })
  }

  static invalidListLimit(limit: number, max: number): GatewayError {
    return new GatewayError(`List limit must be an integer between 1 and ${max}`, {
      code: "invalid_list_limit",
      context: { operation: "list", limit },
      isRetryable: false,
    })
  }
}
