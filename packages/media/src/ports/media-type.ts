/** A MIME type string such as "image/png" or "text/plain; charset=utf-8". */
export type MediaType = string

export const MediaTypes = {
  Jpeg: "image/jpeg",
  Png: "image/png",
  Gif: "image/gif",
  Webp: "image/webp",
  Bmp: "image/bmp",
  Icon: "image/x-icon",
  Pdf: "application/pdf",
  Zip: "application/zip",
  Gzip: "application/x-gzip",
  PlainText: "text/plain; charset=utf-8",
  OctetStream: "application/octet-stream",
} as const satisfies Record<string, MediaType>

/**
 * The part of a media type before any parameters, lower-cased:
 * `"Text/Plain; charset=utf-8"` becomes `"text/plain"`.
 */
export function essenceOf(mediaType: MediaType): string {
  const semicolon = mediaType.indexOf(";")
  const essence = semicolon === -1 ? mediaType : mediaType.slice(0, semicolon)

  return essence.trim().toLowerCase()
}
