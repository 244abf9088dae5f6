import { describe, expect, it } from "vitest"
import { FetchError } from "./errors"
import { Err, Ok, wrap } from "./result"

describe("result", () => {
  it("carries a value", () => {
    const result = Ok(3)
    expect(result.val).toBe(3)
    expect(result.err).toBeUndefined()
  })

  it("carries an error", () => {
    const error = new FetchError({ message: "boom", retry: true })
    const result = Err(error)
    expect(result.err).toBe(error)
    expect(result.err.retry).toBe(true)
    expect(result.err.name).toBe("FetchError")
  })

  it("wraps a rejected promise", async () => {
    const result = await wrap(
      Promise.reject(new Error("down")),
      (e) => new FetchError({ message: e.message, retry: false })
    )
    expect(result.err?.message).toBe("down")
  })

  it("wraps a resolved promise", async () => {
    const result = await wrap(Promise.resolve("up"), (e) => new FetchError({ message: e.message, retry: false }))
    expect(result.val).toBe("up")
  })
})
