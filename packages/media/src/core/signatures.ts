import { type MediaType, MediaTypes } from "../ports/media-type"

type BytePattern = {
  offset: number
  bytes: readonly number[]
}

export type Signature = {
  mediaType: MediaType
  /** Every pattern must match. */
  patterns: readonly BytePattern[]
}

const ascii = (text: string): number[] => [...text].map((c) => c.charCodeAt(0))

export const SIGNATURES: readonly Signature[] = [
  { mediaType: MediaTypes.Jpeg, patterns: [{ offset: 0, bytes: [0xff, 0xd8, 0xff] }] },
  {
    mediaType: MediaTypes.Png,
    patterns: [{ offset: 0, bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] }],
  },
  { mediaType: MediaTypes.Gif, patterns: [{ offset: 0, bytes: ascii("GIF87a") }] },
  { mediaType: MediaTypes.Gif, patterns: [{ offset: 0, bytes: ascii("GIF89a") }] },
  {
    mediaType: MediaTypes.Webp,
    patterns: [
      { offset: 0, bytes: ascii("RIFF") },
      { offset: 8, bytes: ascii("WEBP") },
    ],
  },
  { mediaType: MediaTypes.Bmp, patterns: [{ offset: 0, bytes: ascii("BM") }] },
  { mediaType: MediaTypes.Icon, patterns: [{ offset: 0, bytes: [0x00, 0x00, 0x01, 0x00] }] },
  { mediaType: MediaTypes.Pdf, patterns: [{ offset: 0, bytes: ascii("%PDF-") }] },
  { mediaType: MediaTypes.Zip, patterns: [{ offset: 0, bytes: [0x50, 0x4b, 0x03, 0x04] }] },
  { mediaType: MediaTypes.Gzip, patterns: [{ offset: 0, bytes: [0x1f, 0x8b, 0x08] }] },
]

export function matchesSignature(head: Uint8Array, signature: Signature): boolean {
  return signature.patterns.every(({ offset, bytes }) =>
    bytes.every((byte, i) => head[offset + i] === byte),
  )
}
