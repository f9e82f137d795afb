import { BaseError } from "../../base-error"
import { toAppError } from "../to-app-error"

describe("toAppError", () => {
  it("returns BaseError instances unchanged", () => {
    const err = new BaseError("original", { code: "orig", context: { id: 1 } })

    expect(toAppError(err)).toBe(err)
  })

  it("wraps standard errors, keeping message and cause", () => {
    const err = new Error("standard")
    const result = toAppError(err, "sink_construction_failed")

    expect(result).toBeInstanceOf(BaseError)
    expect(result.message).toBe("standard")
    expect(result.cause).toBe(err)
    expect(result.code).toBe("sink_construction_failed")
    expect(result.isOperational).toBe(true)
  })

  it("copies errno details into context", () => {
    const err = Object.assign(new Error("ENOENT: no such file or directory"), {
      code: "ENOENT",
      syscall: "open",
      path: "/missing/dir/app.log",
    })

    expect(toAppError(err).context).toEqual({
      errno: "ENOENT",
      syscall: "open",
      path: "/missing/dir/app.log",
    })
  })

  it("uses 'unknown' as the default code", () => {
    expect(toAppError(new Error("x")).code).toBe("unknown")
  })

  it("wraps string values as the message", () => {
    const result = toAppError("something broke")

    expect(result.message).toBe("something broke")
    expect(result.context).toEqual({})
    expect(result.isOperational).toBe(false)
  })

  it("wraps other values into context", () => {
    const result = toAppError({ weird: true })

    expect(result.message).toBe("Unknown error")
    expect(result.context).toEqual({ value: { weird: true } })
  })
})
