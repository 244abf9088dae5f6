import type { PeerRecord } from "@peerline/db/validators"
import { beforeEach, describe, expect, it } from "vitest"
import { MemoryPeerRepository } from "./providers/memory"

const T0 = 1_800_000_000_000

function peer(id: string, userId: string, state: PeerRecord["state"]): PeerRecord {
  return {
    id,
    userId,
    remoteId: state === "pending" ? null : `rp_${id}`,
    idempotencyKey: `key-${id}`,
    state,
    label: null,
    publicKey: null,
    config: null,
    revokedAtM: state === "revoked" ? T0 : null,
    createdAtM: T0,
    updatedAtM: T0,
  }
}

describe("MemoryPeerRepository", () => {
  let repository: MemoryPeerRepository

  beforeEach(async () => {
    repository = new MemoryPeerRepository()
    await repository.insert(peer("a", "usr_b", "active"))
    await repository.insert(peer("b", "usr_b", "pending"))
    await repository.insert(peer("c", "usr_a", "active"))
    await repository.insert(peer("d", "usr_c", "revoked"))
  })

  it("counts only active peers", async () => {
    const { val } = await repository.countActive("usr_b")
    expect(val).toBe(1)
  })

  it("filters a user's peers by state", async () => {
    const { val } = await repository.listByUser({ userId: "usr_b", states: ["pending"] })
    expect(val?.map((p) => p.id)).toEqual(["b"])
  })

  it("finds a peer by idempotency key", async () => {
    const { val } = await repository.findByIdempotencyKey("key-c")
    expect(val?.id).toBe("c")
  })

  it("lists users holding live peers", async () => {
    const { val } = await repository.listUsersWithPeers({ limit: 10 })
    expect(val).toEqual(["usr_a", "usr_b"])
  })

  it("stamps updates and returns null for unknown peers", async () => {
    const updated = await repository.update({ peerId: "b", patch: { state: "active" }, now: T0 + 5 })
    const missing = await repository.update({ peerId: "zz", patch: { state: "active" }, now: T0 })

    expect(updated.val).toMatchObject({ state: "active", updatedAtM: T0 + 5 })
    expect(missing.val).toBeNull()
  })
})
