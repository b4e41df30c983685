import { BaseError } from "../../base-error"
import { toAppError } from "../to-app-error"

describe("toAppError", () => {
  it("returns an AppError unchanged", () => {
    const err = new BaseError("original", { code: "parse_error", context: { line: 1 } })

    expect(toAppError(err)).toBe(err)
  })

  describe("standard Error input", () => {
    it("wraps it in a non-operational BaseError", () => {
      const err = new Error("standard")
      const result = toAppError(err)

      expect(result).toBeInstanceOf(BaseError)
      expect(result.message).toBe("standard")
      expect(result.cause).toBe(err)
      expect(result.isOperational).toBe(false)
    })

    it("uses the fallback code", () => {
      expect(toAppError(new Error("x")).code).toBe("unknown")
      expect(toAppError(new Error("x"), "cli_failed").code).toBe("cli_failed")
    })
  })

  describe("non-Error input", () => {
    it("uses a thrown string as the message", () => {
      const result = toAppError("went wrong")

      expect(result.message).toBe("went wrong")
      expect(result.context).toEqual({})
    })

    it("keeps other values in context", () => {
      const result = toAppError(404)

      expect(result.message).toBe("Unknown error")
      expect(result.context).toEqual({ value: 404 })
    })
  })
})
