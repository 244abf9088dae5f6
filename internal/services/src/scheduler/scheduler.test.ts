import { SECONDS_PER_DAY } from "@peerline/config"
import { beforeEach, describe, expect, it, vi } from "vitest"
import { type MemoryProvisioning, createMemoryProvisioning } from "../test-utils"
import { ExpiryScheduler } from "./service"

const T0 = 1_800_000_000_000
const USER = "usr_alice"
const WINDOW_MS = 30 * SECONDS_PER_DAY * 1000

async function statusOf(p: MemoryProvisioning, userId = USER) {
  const { val } = await p.ledger.get(userId)
  return val?.status
}

describe("ExpiryScheduler", () => {
  let p: MemoryProvisioning

  beforeEach(async () => {
    p = createMemoryProvisioning({ now: T0 })
    await p.submit({
      kind: "activate",
      userId: USER,
      plan: "standard",
      extensionSeconds: 30 * SECONDS_PER_DAY,
    })
  })

  it("keys expire intents by user and window end", async () => {
    const { val } = await p.ledger.get(USER)
    expect(val && ExpiryScheduler.expireKey(val)).toBe(`expire:${USER}:${T0 + WINDOW_MS}`)
  })

  it("ignores subscriptions whose window is still open", async () => {
    const { val } = await p.scheduler.tick()
    expect(val).toEqual({ scanned: 0, expired: 0, grace: 0, rejected: 0, failed: 0 })
  })

  it("expires a due subscription in exactly one tick", async () => {
    await p.submit({ kind: "issue", userId: USER })
    p.clock.advanceBy(WINDOW_MS)

    const first = await p.scheduler.tick()
    const second = await p.scheduler.tick()

    expect(first.val).toEqual({ scanned: 1, expired: 1, grace: 0, rejected: 0, failed: 0 })
    expect(second.val?.scanned).toBe(0)
    expect(await statusOf(p)).toBe("expired")
    expect(p.controlPlane.peersOf(USER)).toEqual([])
  })

  it("goes through grace when a peer cannot be revoked yet", async () => {
    await p.submit({ kind: "issue", userId: USER })
    await p.submit({ kind: "issue", userId: USER })
    p.clock.advanceBy(WINDOW_MS)
    p.controlPlane.fail("removePeer", { kind: "unavailable" }, 3)

    const first = await p.scheduler.tick()

    expect(first.val).toMatchObject({ scanned: 1, grace: 1, expired: 0 })
    expect(await statusOf(p)).toBe("grace")
    expect(p.controlPlane.peersOf(USER)).toHaveLength(1)

    const second = await p.scheduler.tick()

    expect(second.val).toMatchObject({ scanned: 1, grace: 0, expired: 1 })
    expect(await statusOf(p)).toBe("expired")
    expect(p.controlPlane.peersOf(USER)).toEqual([])
  })

  it("runs ticks on an interval until stopped", async () => {
    p.clock.advanceBy(WINDOW_MS)

    p.scheduler.start(5)
    await vi.waitFor(async () => expect(await statusOf(p)).toBe("expired"), { interval: 5 })
    await p.scheduler.stop()

    expect(p.divergence.size).toBe(0)
  })
})
