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
      const err = new BaseError("feature has invalid length", { code: "invalid_length" })

      expect(err.message).toBe("feature has invalid length")
      expect(err.code).toBe("invalid_length")
    })

    it("sets name to constructor name", () => {
      class ShapeError extends BaseError<"invalid_shape"> {}
      const err = new ShapeError("bad", { code: "invalid_shape" })

      expect(err.name).toBe("ShapeError")
    })

    it("defaults context to a frozen empty object", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("defaults isRetryable to false and isOperational to true", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
    })

    it("sets timestamp to current time", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("copies and freezes the given context", () => {
      const context = { feature: "age", expected: 5 }
      const err = new BaseError("test", { code: "test", context })

      context.expected = 7

      expect(err.context).toEqual({ feature: "age", expected: 5 })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new RangeError("offset out of bounds")
      const err = new BaseError("wrapped", { code: "test", cause })

      expect(err.cause).toBe(cause)
    })

    it("leaves cause undefined when not given", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.cause).toBeUndefined()
    })

    it("accepts isRetryable and isOperational overrides", () => {
      const err = new BaseError("invariant", {
        code: "bug",
        isRetryable: true,
        isOperational: false,
      })

      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("is an Error with a stack trace", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err).toBeInstanceOf(Error)
      expect(err.stack).toContain("BaseError")
    })
  })

  describe("type safety", () => {
    it("preserves generic code type", () => {
      type CodecCode = "unknown_native_type" | "unknown_logical_type"
      const err = new BaseError<CodecCode>("no entry", { code: "unknown_logical_type" })

      const code: CodecCode = err.code
      expect(code).toBe("unknown_logical_type")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error", () => {
      const err = new BaseError("missing", {
        code: "missing_feature",
        context: { feature: "income" },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "missing_feature",
        message: "missing",
        context: { feature: "income" },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("is used by JSON.stringify", () => {
      const err = new BaseError("missing", { code: "missing_feature" })

      expect(JSON.parse(JSON.stringify(err))).toMatchObject({ code: "missing_feature" })
    })
  })
})
