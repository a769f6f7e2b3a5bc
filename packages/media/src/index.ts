export { MediaError, type MediaErrorCode } from "./core/media.errors"
export { DEFAULT_ALLOWED_MEDIA_TYPES, MediaTypePolicy } from "./core/media-policy"
export { SNIFF_WINDOW_BYTES, sniffMediaType } from "./core/sniff"
export { essenceOf, type MediaType, MediaTypes } from "./ports/media-type"
