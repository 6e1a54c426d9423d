import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2026-03-02T08:15:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError", () => {
    it("serializes all fields", () => {
      const err = new BaseError("bad buffer", {
        code: "invalid_counter_buffer",
        context: { byteLength: 4 },
        isRetryable: true,
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "invalid_counter_buffer",
        message: "bad buffer",
        context: { byteLength: 4 },
        isOperational: false,
        timestamp: "2026-03-02T08:15:00.000Z",
      })
    })

    it("omits the stack unless requested", () => {
      const err = new BaseError("x", { code: "x" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("omits an empty stack even when requested", () => {
      const err = new BaseError("x", { code: "x" })
      err.stack = ""

      expect("stack" in serializeError(err, { includeStack: true })).toBe(false)
    })

    it("serializes the cause chain", () => {
      const root = new Error("root")
      const middle = new BaseError("middle", { code: "middle", cause: root })
      const outer = new BaseError("outer", { code: "outer", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("middle")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("root")
    })

    it("omits cause when there is none", () => {
      expect("cause" in serializeError(new BaseError("x", { code: "x" }))).toBe(false)
    })
  })

  describe("Error", () => {
    it("uses code unknown and marks it non-operational", () => {
      const serialized = serializeError(new TypeError("not a function"))

      expect(serialized).toEqual({
        name: "TypeError",
        code: "unknown",
        message: "not a function",
        context: {},
        isOperational: false,
        timestamp: "2026-03-02T08:15:00.000Z",
      })
    })

    it("follows Error.cause", () => {
      const err = new Error("wrapper", { cause: new Error("root") })

      expect(serializeError(err).cause?.message).toBe("root")
    })
  })

  describe("non-Error values", () => {
    it("uses a thrown string as the message", () => {
      const serialized = serializeError("boom")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("boom")
    })

    it("keeps other values in context.value", () => {
      const value = { ordinal: "7" }

      expect(serializeError(value).context).toEqual({ value })
      expect(serializeError(value).message).toBe("Unknown error")
      expect(serializeError(null).context).toEqual({ value: null })
    })
  })
})
