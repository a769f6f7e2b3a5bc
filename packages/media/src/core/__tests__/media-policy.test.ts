import { MediaTypes } from "../../ports/media-type"
import { MediaError } from "../media.errors"
import { DEFAULT_ALLOWED_MEDIA_TYPES, MediaTypePolicy } from "../media-policy"

describe("MediaTypePolicy", () => {
  it("allows jpeg, png, webp and pdf by default", () => {
    const policy = new MediaTypePolicy()

    expect(policy.allowedTypes()).toEqual([
      "image/jpeg",
      "image/png",
      "image/webp",
      "application/pdf",
    ])
    expect(DEFAULT_ALLOWED_MEDIA_TYPES).toHaveLength(4)
  })

  it("compares on the essence of the media type", () => {
    const policy = new MediaTypePolicy(["Text/Plain"])

    expect(policy.isAllowed(MediaTypes.PlainText)).toBe(true)
    expect(policy.isAllowed("text/html")).toBe(false)
  })

  it("throws MediaError with a generic message on rejection", () => {
    const policy = new MediaTypePolicy()

    let caught: unknown
    try {
      policy.assertAllowed(MediaTypes.Gif)
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(MediaError)
    expect(caught).toMatchObject({
      code: "unsupported_media_type",
      message: "Unsupported media type",
      context: {},
    })
  })

  it("uses the same message whatever was detected", () => {
    const policy = new MediaTypePolicy([MediaTypes.Pdf])

    const messages = [MediaTypes.Gif, MediaTypes.OctetStream, MediaTypes.Zip].map((type) => {
      try {
        policy.assertAllowed(type)
        return "allowed"
      } catch (err) {
        return err instanceof Error ? err.message : String(err)
      }
    })

    expect(new Set(messages)).toEqual(new Set(["Unsupported media type"]))
  })

  it("does not throw for allowed types", () => {
    expect(() => new MediaTypePolicy().assertAllowed(MediaTypes.Webp)).not.toThrow()
  })
})
