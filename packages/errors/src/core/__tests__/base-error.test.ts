import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("creates error with message and code", () => {
      const err = new BaseError("Bucket missing", { code: "bucket_not_found" })

      expect(err.message).toBe("Bucket missing")
      expect(err.code).toBe("bucket_not_found")
    })

    it("sets name to constructor name", () => {
      class StorageFailure extends BaseError<"backend_error"> {}

      expect(new BaseError("x", { code: "x" }).name).toBe("BaseError")
      expect(new StorageFailure("x", { code: "backend_error" }).name).toBe(
        "StorageFailure",
      )
    })

    it("defaults to non-retryable operational error with empty frozen context", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("sets timestamp to current time", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("copies and freezes the given context", () => {
      const context = { bucket: "media", key: "a.png" }
      const err = new BaseError("test", { code: "test", context })

      context.key = "changed.png"

      expect(err.context).toEqual({ bucket: "media", key: "a.png" })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new Error("socket hang up")
      const err = new BaseError("wrapped", { code: "backend_unavailable", cause })

      expect(err.cause).toBe(cause)
    })

    it("has no own cause when none is given", () => {
      const err = new BaseError("test", { code: "test" })

      expect("cause" in err).toBe(false)
    })

    it("is instanceof Error", () => {
      expect(new BaseError("test", { code: "test" })).toBeInstanceOf(Error)
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error", () => {
      const err = new BaseError("Deadline exceeded", {
        code: "operation_timeout",
        context: { operation: "put" },
        isRetryable: true,
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "operation_timeout",
        message: "Deadline exceeded",
        context: { operation: "put" },
        isRetryable: true,
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})
