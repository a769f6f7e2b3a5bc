import { BaseError } from "@stowage/errors"

export type MediaErrorCode = "unsupported_media_type"

export class MediaError extends BaseError<MediaErrorCode> {
  /** Same message for every rejection; the detected type is never echoed back. */
  static unsupportedMediaType(): MediaError {
    return new MediaError("Unsupported media type", {
      code: "unsupported_media_type",
      isRetryable: false,
    })
  }
}
