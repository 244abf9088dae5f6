import { NoopLogger } from "@peerline/logging"
import { beforeEach, describe, expect, it } from "vitest"
import { createClock } from "../test-utils"
import { LockManager } from "./manager"
import { MemoryLockStore } from "./providers/memory"

describe("LockManager", () => {
  let store: MemoryLockStore
  let clock: ReturnType<typeof createClock>
  let locks: LockManager

  beforeEach(() => {
    store = new MemoryLockStore()
    clock = createClock(1_800_000_000_000)
    locks = new LockManager({
      store,
      logger: new NoopLogger(),
      clock: clock.now,
      ttlMs: 1_000,
      waitMs: 0,
      pollMs: 5,
      heartbeat: false,
    })
  })

  it("admits one holder per resource", async () => {
    const first = await locks.acquire("usr_1")
    const second = await locks.acquire("usr_1")
    const other = await locks.acquire("usr_2")

    expect(first.err).toBeUndefined()
    expect(second.err?.code).toBe("BUSY")
    expect(other.err).toBeUndefined()
  })

  it("hands out a larger fence on every acquisition", async () => {
    const first = await locks.acquire("usr_1")
    if (first.err) throw first.err
    await locks.release(first.val)

    const second = await locks.acquire("usr_1")
    if (second.err) throw second.err

    expect(second.val.fence).toBeGreaterThan(first.val.fence)
  })

  it("waits for the current holder within the wait budget", async () => {
    const first = await locks.acquire("usr_1")
    if (first.err) throw first.err

    const waiting = locks.acquire("usr_1", { waitMs: 1_000 })
    setTimeout(() => {
      void locks.release(first.val)
    }, 20)

    const second = await waiting
    expect(second.err).toBeUndefined()
  })

  it("gives up when the caller aborts the wait", async () => {
    await locks.acquire("usr_1")
    const controller = new AbortController()

    const waiting = locks.acquire("usr_1", { waitMs: 10_000, signal: controller.signal })
    controller.abort()

    const { err } = await waiting
    expect(err?.code).toBe("BUSY")
  })

  it("lets a new holder take over an expired lock and fences out the old one", async () => {
    const stale = await locks.acquire("usr_1")
    if (stale.err) throw stale.err

    clock.advanceBy(1_001)
    const fresh = await locks.acquire("usr_1")
    if (fresh.err) throw fresh.err

    const check = await stale.val.assertHeld()
    expect(check.err?.code).toBe("LOST")
    expect((await fresh.val.assertHeld()).err).toBeUndefined()

    // compare-and-delete leaves the new holder in place
    await locks.release(stale.val)
    expect(store.holder("usr_1")).toBe(fresh.val.token)
  })

  it("reports a released lock as no longer held", async () => {
    const { val } = await locks.acquire("usr_1")
    if (!val) throw new Error("lock not acquired")

    await locks.release(val)

    expect(await val.isHeld()).toBe(false)
    expect(store.holder("usr_1")).toBeNull()
  })

  it("extends a held lock", async () => {
    const { val } = await locks.acquire("usr_1")
    if (!val) throw new Error("lock not acquired")

    clock.advanceBy(900)
    expect(await val.extend()).toBe(true)
    clock.advanceBy(900)

    expect(await val.isHeld()).toBe(true)
  })

  describe("withLock", () => {
    it("releases after the run", async () => {
      const result = await locks.withLock("usr_1", async (lock) => {
        expect(store.holder("usr_1")).toBe(lock.token)
        return "done"
      })

      expect(result.val).toBe("done")
      expect(store.holder("usr_1")).toBeNull()
    })

    it("releases when the run throws", async () => {
      await expect(
        locks.withLock("usr_1", async () => {
          throw new Error("step failed")
        })
      ).rejects.toThrow("step failed")

      expect(store.holder("usr_1")).toBeNull()
    })

    it("does not run while another holder has the lock", async () => {
      await locks.acquire("usr_1")
      let ran = false

      const result = await locks.withLock("usr_1", async () => {
        ran = true
      })

      expect(result.err?.code).toBe("BUSY")
      expect(ran).toBe(false)
    })
  })
})
