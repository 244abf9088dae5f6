import { afterEach, describe, expect, it, vi } from "vitest"
import { getTimestampFromId, newId, randomId } from "./id"

describe("newId", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("prefixes ids by entity", () => {
    expect(newId("peer")).toMatch(/^peer_[1-9A-HJ-NP-Za-km-z]{22}$/)
    expect(newId("intent").startsWith("int_")).toBe(true)
  })

  it("encodes the generation time", () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2040-03-01T10:00:00.000Z"))

    const id = newId("user")

    expect(getTimestampFromId(id)).toBe(Date.parse("2040-03-01T10:00:00.000Z"))
  })

  it("sorts ids generated in the same millisecond in creation order", () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2040-03-01T10:00:00.000Z"))

    const ids = Array.from({ length: 50 }, () => newId("peer"))

    expect([...ids].sort()).toEqual(ids)
  })
})

describe("randomId", () => {
  it("does not repeat", () => {
    expect(randomId()).not.toBe(randomId())
  })
})
