import { MediaTypes } from "../../ports/media-type"
import { SNIFF_WINDOW_BYTES, sniffMediaType } from "../sniff"

const bytes = (...values: number[]) => Uint8Array.from(values)
const text = (value: string) => new TextEncoder().encode(value)

describe("sniffMediaType", () => {
  describe("signatures", () => {
    it.each([
      ["jpeg", bytes(0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10), MediaTypes.Jpeg],
      ["png", bytes(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00), MediaTypes.Png],
      ["gif87a", text("GIF87a..."), MediaTypes.Gif],
      ["gif89a", text("GIF89a..."), MediaTypes.Gif],
      ["webp", text("RIFF$\u0000\u0000\u0000WEBPVP8 "), MediaTypes.Webp],
      ["bmp", text("BM6\u0000"), MediaTypes.Bmp],
      ["ico", bytes(0x00, 0x00, 0x01, 0x00, 0x01, 0x00), MediaTypes.Icon],
      ["pdf", text("%PDF-1.7\n"), MediaTypes.Pdf],
      ["zip", bytes(0x50, 0x4b, 0x03, 0x04, 0x14, 0x00), MediaTypes.Zip],
      ["gzip", bytes(0x1f, 0x8b, 0x08, 0x00), MediaTypes.Gzip],
    ])("detects %s", (_name, head, expected) => {
      expect(sniffMediaType(head)).toBe(expected)
    })

    it("does not take RIFF without WEBP for webp", () => {
      expect(sniffMediaType(text("RIFF$\u0000\u0000\u0000WAVEfmt "))).toBe(
        MediaTypes.OctetStream,
      )
    })

    it("does not take a truncated png signature for png", () => {
      expect(sniffMediaType(bytes(0x89, 0x50, 0x4e, 0x47))).toBe(MediaTypes.PlainText)
    })
  })

  describe("fallbacks", () => {
    it("treats empty input as text", () => {
      expect(sniffMediaType(new Uint8Array())).toBe("text/plain; charset=utf-8")
    })

    it("treats printable input as text", () => {
      expect(sniffMediaType(text("id,name\n1,stowage\r\n\tend\f"))).toBe(MediaTypes.PlainText)
    })

    it("treats input with control bytes as binary", () => {
      expect(sniffMediaType(bytes(0x41, 0x42, 0x00, 0x43))).toBe("application/octet-stream")
      expect(sniffMediaType(bytes(0x41, 0x1b, 0x5b))).toBe(MediaTypes.PlainText)
      expect(sniffMediaType(bytes(0x41, 0x1c))).toBe(MediaTypes.OctetStream)
    })

    it("ignores bytes past the sniff window", () => {
      const head = new Uint8Array(SNIFF_WINDOW_BYTES + 1).fill(0x61)
      head[SNIFF_WINDOW_BYTES] = 0x00

      expect(sniffMediaType(head)).toBe(MediaTypes.PlainText)
    })
  })

  it("depends only on content, never on a file name", () => {
    const png = bytes(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a)
    const forNames = ["photo.png", "photo.exe", "photo.pdf", "photo"].map(() =>
      sniffMediaType(png),
    )

    expect(new Set(forNames)).toEqual(new Set([MediaTypes.Png]))
  })
})
