import type { PeerRecord, PeerState } from "@peerline/db/validators"
import { Ok, type Result } from "@peerline/error"
import type { StorageError } from "../../errors"
import type { PeerPatch, PeerRepository } from "../repository"

export class MemoryPeerRepository implements PeerRepository {
  readonly name = "memory"
  private readonly memory: Map<string, PeerRecord>

  constructor(opts: { memory?: Map<string, PeerRecord> } = {}) {
    this.memory = opts.memory ?? new Map()
  }

  async insert(peer: PeerRecord): Promise<Result<PeerRecord, StorageError>> {
    this.memory.set(peer.id, { ...peer })
    return Ok({ ...peer })
  }

  async find(peerId: string): Promise<Result<PeerRecord | null, StorageError>> {
    const peer = this.memory.get(peerId)
    return Ok(peer ? { ...peer } : null)
  }

  async findByIdempotencyKey(
    idempotencyKey: string
  ): Promise<Result<PeerRecord | null, StorageError>> {
    for (const peer of this.memory.values()) {
      if (peer.idempotencyKey === idempotencyKey) return Ok({ ...peer })
    }
    return Ok(null)
  }

  async listByUser({
    userId,
    states,
  }: {
    userId: string
    states?: PeerState[]
  }): Promise<Result<PeerRecord[], StorageError>> {
    const peers = [...this.memory.values()]
      .filter((p) => p.userId === userId && (!states || states.includes(p.state)))
      .sort((a, b) => a.createdAtM - b.createdAtM)
      .map((p) => ({ ...p }))
    return Ok(peers)
  }

  async countActive(userId: string): Promise<Result<number, StorageError>> {
    let count = 0
    for (const peer of this.memory.values()) {
      if (peer.userId === userId && peer.state === "active") count++
    }
    return Ok(count)
  }

  async update({
    peerId,
    patch,
    now,
  }: {
    peerId: string
    patch: PeerPatch
    now: number
  }): Promise<Result<PeerRecord | null, StorageError>> {
    const current = this.memory.get(peerId)
    if (!current) return Ok(null)

    const next = { ...current, ...patch, updatedAtM: now }
    this.memory.set(peerId, next)
    return Ok({ ...next })
  }

  async delete(peerId: string): Promise<Result<void, StorageError>> {
    this.memory.delete(peerId)
    return Ok(undefined)
  }

  async listUsersWithPeers({ limit }: { limit: number }): Promise<Result<string[], StorageError>> {
    const users = new Set<string>()
    for (const peer of this.memory.values()) {
      if (peer.state !== "revoked") users.add(peer.userId)
    }
    return Ok([...users].sort().slice(0, limit))
  }
}
