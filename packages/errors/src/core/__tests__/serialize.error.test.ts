import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes all fields", () => {
      const err = new BaseError("Object missing", {
        code: "object_not_found",
        context: { bucket: "media", key: "k.png" },
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "object_not_found",
        message: "Object missing",
        context: { bucket: "media", key: "k.png" },
        isRetryable: false,
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("includes stack only when requested", () => {
      const err = new BaseError("test", { code: "test" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("serializes cause chain recursively", () => {
      const root = new Error("ECONNRESET")
      const middle = new BaseError("middle", { code: "backend_unavailable", cause: root })
      const outer = new BaseError("outer", { code: "operation_timeout", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("backend_unavailable")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("ECONNRESET")
    })
  })

  describe("standard Error instances", () => {
    it("serializes as a non-operational unknown error", () => {
      const serialized = serializeError(new TypeError("not a function"))

      expect(serialized).toEqual({
        name: "TypeError",
        code: "unknown",
        message: "not a function",
        context: {},
        isRetryable: false,
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("handles Error with cause", () => {
      const err = new Error("wrapper", { cause: new Error("root") })

      expect(serializeError(err).cause?.message).toBe("root")
    })
  })

  describe("non-Error values", () => {
    it("wraps string as message", () => {
      const serialized = serializeError("something went wrong")

      expect(serialized.message).toBe("something went wrong")
      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.context).toEqual({})
    })

    it("wraps object in context.value", () => {
      const obj = { status: 503 }

      const serialized = serializeError(obj)

      expect(serialized.context).toEqual({ value: obj })
      expect(serialized.message).toBe("Unknown error")
    })

    it("handles null", () => {
      expect(serializeError(null).context).toEqual({ value: null })
    })
  })
})
