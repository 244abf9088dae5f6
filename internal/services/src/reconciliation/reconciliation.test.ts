import { SECONDS_PER_DAY } from "@peerline/config"
import type { PeerRecord } from "@peerline/db/validators"
import { beforeEach, describe, expect, it } from "vitest"
import { type MemoryProvisioning, createMemoryProvisioning } from "../test-utils"
import { MemoryDivergenceStore } from "./providers/memory"
import { DivergenceQueue } from "./queue"

const T0 = 1_800_000_000_000
const USER = "usr_alice"

function localPeer(overrides: Partial<PeerRecord> & { id: string }): PeerRecord {
  return {
    userId: USER,
    remoteId: null,
    idempotencyKey: overrides.id,
    state: "active",
    label: null,
    publicKey: null,
    config: null,
    revokedAtM: null,
    createdAtM: T0,
    updatedAtM: T0,
    ...overrides,
  }
}

async function liveRemoteIds(p: MemoryProvisioning, userId = USER) {
  const { val } = await p.peers.listByUser({ userId, states: ["active"] })
  return (val ?? []).map((peer) => peer.remoteId).sort()
}

function remoteIds(p: MemoryProvisioning, userId = USER) {
  return p.controlPlane.peersOf(userId).map((peer) => peer.remoteId).sort()
}

describe("DivergenceQueue", () => {
  it("keeps one entry per user and drains oldest first", () => {
    const queue = new DivergenceQueue()
    queue.enqueue("usr_a", "first", 1)
    queue.enqueue("usr_b", "second", 2)
    queue.enqueue("usr_a", "again", 3)

    expect(queue.size).toBe(2)
    expect(queue.drain(1)).toEqual(["usr_a"])
    expect(queue.drain()).toEqual(["usr_b"])
    expect(queue.size).toBe(0)
  })

  it("writes flags through to its store and keeps one raised after the check", async () => {
    const store = new MemoryDivergenceStore()
    const queue = new DivergenceQueue({ store })

    queue.enqueue("usr_a", "first", 5)
    queue.resolve("usr_a", 4)

    expect(queue.has("usr_a")).toBe(true)
    expect(store.flags.get("usr_a")).toEqual({ userId: "usr_a", reason: "first", sinceM: 5 })

    queue.resolve("usr_a", 5)

    expect(queue.has("usr_a")).toBe(false)
    expect(store.flags.size).toBe(0)
  })

  it("lists flags raised by another worker", async () => {
    const store = new MemoryDivergenceStore()
    new DivergenceQueue({ store }).enqueue("usr_b", "lock lost", 2)
    new DivergenceQueue({ store }).enqueue("usr_a", "lock lost", 1)

    const { val } = await new DivergenceQueue({ store }).flagged({ limit: 10 })

    expect(val).toEqual(["usr_a", "usr_b"])
  })
})

describe("Reconciler", () => {
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

  it("leaves matching sides alone without taking the lock", async () => {
    await p.submit({ kind: "issue", userId: USER })
    const acquire = p.stores.locks.acquire.bind(p.stores.locks)
    let acquired = 0
    p.stores.locks.acquire = (params) => {
      acquired++
      return acquire(params)
    }

    const { val } = await p.reconciler.reconcileUser(USER)

    expect(val?.diverged).toBe(false)
    expect(acquired).toBe(0)
    expect(p.controlPlane.count("removePeer")).toBe(0)
  })

  it("converges after an orphan remote peer and a stale local record", async () => {
    await p.submit({ kind: "issue", userId: USER })
    p.controlPlane.seed({ userId: USER })
    await p.peers.insert(localPeer({ id: "peer_ghost", remoteId: "rp_ghost" }))

    const { val, err } = await p.reconciler.reconcileUser(USER)

    expect(err).toBeUndefined()
    expect(val).toEqual({
      userId: USER,
      diverged: true,
      adopted: 0,
      removedRemote: 1,
      revokedLocal: 1,
      droppedPending: 0,
      failures: 0,
    })
    expect(await liveRemoteIds(p)).toEqual(["rp_1"])
    expect(remoteIds(p)).toEqual(["rp_1"])
  })

  it("adopts a stale pending record whose peer exists remotely", async () => {
    await p.peers.insert(localPeer({ id: "peer_pending", state: "pending", idempotencyKey: "k-1" }))
    const handle = p.controlPlane.seed({ userId: USER, idempotencyKey: "k-1" })

    const { val } = await p.reconciler.reconcileUser(USER)

    expect(val?.adopted).toBe(1)
    const { val: peer } = await p.peers.find("peer_pending")
    expect(peer).toMatchObject({ state: "active", remoteId: handle.remoteId, publicKey: handle.publicKey })
  })

  it("drops a stale pending record that never reached the appliance", async () => {
    await p.peers.insert(localPeer({ id: "peer_pending", state: "pending" }))

    const { val } = await p.reconciler.reconcileUser(USER)

    expect(val?.droppedPending).toBe(1)
    const { val: peer } = await p.peers.find("peer_pending")
    expect(peer).toBeNull()
  })

  it("removes the remote peer of a pending record when the user is no longer entitled", async () => {
    await p.peers.insert(localPeer({ id: "peer_pending", state: "pending", idempotencyKey: "k-2" }))
    p.controlPlane.seed({ userId: USER, idempotencyKey: "k-2" })
    p.clock.advanceBy(31 * SECONDS_PER_DAY * 1000)

    const { val } = await p.reconciler.reconcileUser(USER)

    expect(val).toMatchObject({ adopted: 0, removedRemote: 1, droppedPending: 1 })
    expect(remoteIds(p)).toEqual([])
  })

  it("queues the user again when the lock is busy", async () => {
    p.controlPlane.seed({ userId: USER })
    await p.stores.locks.acquire({ resource: USER, token: "other", ttlMs: 60_000, now: T0 })

    const { err } = await p.reconciler.reconcileUser(USER)

    expect(err?.code).toBe("BUSY")
    expect(p.divergence.has(USER)).toBe(true)
    expect(remoteIds(p)).toHaveLength(1)
  })

  it("sweeps queued users and users holding peers", async () => {
    await p.submit({ kind: "issue", userId: USER })
    p.controlPlane.seed({ userId: "usr_bob" })
    p.divergence.enqueue("usr_bob", "orphan suspected")

    const report = await p.reconciler.sweep()

    expect(report).toEqual({ checked: 2, diverged: 1, repaired: 1, busy: 0, failed: 0 })
    expect(remoteIds(p, "usr_bob")).toEqual([])
    expect(p.divergence.size).toBe(0)
    expect(p.stores.divergence.flags.size).toBe(0)
  })

  it("reconciles a user flagged only in the store", async () => {
    p.controlPlane.seed({ userId: "usr_bob", idempotencyKey: "lost-add" })
    await p.stores.divergence.flag({ userId: "usr_bob", reason: "peer add failed: rejected", sinceM: T0 })

    const report = await p.reconciler.sweep()

    expect(report).toEqual({ checked: 1, diverged: 1, repaired: 1, busy: 0, failed: 0 })
    expect(remoteIds(p, "usr_bob")).toEqual([])
    expect(p.stores.divergence.flags.has("usr_bob")).toBe(false)
  })

  it("keeps the flag while an orphan could not be removed", async () => {
    p.controlPlane.seed({ userId: "usr_bob" })
    p.controlPlane.fail("removePeer", { kind: "unavailable" }, 3)

    const { val } = await p.reconciler.reconcileUser("usr_bob")

    expect(val?.failures).toBe(1)
    expect(p.divergence.has("usr_bob")).toBe(true)
    expect(p.stores.divergence.flags.get("usr_bob")?.reason).toBe("orphan removal failed")
  })
})
