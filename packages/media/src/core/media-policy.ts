import { essenceOf, type MediaType, MediaTypes } from "../ports/media-type"
import { MediaError } from "./media.errors"

export const DEFAULT_ALLOWED_MEDIA_TYPES: readonly MediaType[] = [
  MediaTypes.Jpeg,
  MediaTypes.Png,
  MediaTypes.Webp,
  MediaTypes.Pdf,
]

/** Allow-list of media types, compared on their essence (parameters ignored). */
export class MediaTypePolicy {
  private readonly allowed: ReadonlySet<string>

  constructor(allowed: Iterable<MediaType> = DEFAULT_ALLOWED_MEDIA_TYPES) {
    this.allowed = new Set([...allowed].map(essenceOf))
  }

  isAllowed(mediaType: MediaType): boolean {
    return this.allowed.has(essenceOf(mediaType))
  }

  assertAllowed(mediaType: MediaType): void {
    if (!this.isAllowed(mediaType)) {
      throw MediaError.unsupportedMediaType()
    }
  }

  allowedTypes(): string[] {
    return [...this.allowed]
  }
}
