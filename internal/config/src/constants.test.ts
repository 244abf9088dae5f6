import { describe, expect, it } from "vitest"
import { planPeerLimit } from "./constants"

describe("planPeerLimit", () => {
  it("gives trials a single peer", () => {
    expect(planPeerLimit("trial", 5)).toBe(1)
  })

  it("uses the configured allowance for standard plans", () => {
    expect(planPeerLimit("standard", 5)).toBe(5)
  })

  it("doubles the allowance for premium plans", () => {
    expect(planPeerLimit("premium", 5)).toBe(10)
    expect(planPeerLimit("premium")).toBe(6)
  })
})
