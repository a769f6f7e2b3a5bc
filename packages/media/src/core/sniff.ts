import { type MediaType, MediaTypes } from "../ports/media-type"
import { matchesSignature, SIGNATURES } from "./signatures"

/** Bytes the sniffer looks at; callers read at most this much before sniffing. */
export const SNIFF_WINDOW_BYTES = 512

// Control bytes that never appear in text: 0x00-0x08, 0x0B, 0x0E-0x1A, 0x1C-0x1F
function isBinaryByte(byte: number): boolean {
  return (
    byte <= 0x08 ||
    byte === 0x0b ||
    (byte >= 0x0e && byte <= 0x1a) ||
    (byte >= 0x1c && byte <= 0x1f)
  )
}

/**
 * Classifies content from its leading bytes only. Anything past
 * SNIFF_WINDOW_BYTES is ignored; shorter input is judged on what is there.
 */
export function sniffMediaType(head: Uint8Array): MediaType {
  const window = head.subarray(0, SNIFF_WINDOW_BYTES)

  const signature = SIGNATURES.find((s) => matchesSignature(window, s))
  if (signature) return signature.mediaType

  return window.some(isBinaryByte) ? MediaTypes.OctetStream : MediaTypes.PlainText
}
