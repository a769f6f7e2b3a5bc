import { uuidV7 } from "../uuid"

const UUID_V7 = /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

describe("uuidV7 (behavior)", () => {
  it("generates lower-case version 7 UUIDs", () => {
    expect(uuidV7.generate()).toMatch(UUID_V7)
  })

  it("embeds the generation time in the first 48 bits", () => {
    const before = Date.now()
    const id = uuidV7.generate()
    const after = Date.now()

    const embedded = Number.parseInt(id.replaceAll("-", "").slice(0, 12), 16)

    expect(embedded).toBeGreaterThanOrEqual(before)
    expect(embedded).toBeLessThanOrEqual(after)
  })
})
