import type { PeerRecord, PeerState } from "@peerline/db/validators"
import type { Result } from "@peerline/error"
import type { StorageError } from "../errors"

export type PeerPatch = Partial<Pick<PeerRecord, "state" | "remoteId" | "publicKey" | "config" | "revokedAtM">>

/**
 * Local peer records. Writes happen under the owning user's lock.
 */
export interface PeerRepository {
  readonly name: string

  insert(peer: PeerRecord): Promise<Result<PeerRecord, StorageError>>

  find(peerId: string): Promise<Result<PeerRecord | null, StorageError>>

  findByIdempotencyKey(idempotencyKey: string): Promise<Result<PeerRecord | null, StorageError>>

  listByUser(params: {
    userId: string
    states?: PeerState[]
  }): Promise<Result<PeerRecord[], StorageError>>

  countActive(userId: string): Promise<Result<number, StorageError>>

  update(params: {
    peerId: string
    patch: PeerPatch
    now: number
  }): Promise<Result<PeerRecord | null, StorageError>>

  delete(peerId: string): Promise<Result<void, StorageError>>

  /**
   * Users holding pending or active peers, for the reconciliation sweep
   */
  listUsersWithPeers(params: { limit: number }): Promise<Result<string[], StorageError>>
}
