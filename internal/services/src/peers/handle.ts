import type { PeerHandle, PeerRecord } from "@peerline/db/validators"

/**
 * The handle of an active peer as stored locally, client config included
 */
export function handleOf(peer: PeerRecord): PeerHandle | null {
  if (peer.state !== "active" || !peer.remoteId) return null

  return {
    remoteId: peer.remoteId,
    userId: peer.userId,
    idempotencyKey: peer.idempotencyKey,
    publicKey: peer.publicKey,
    config: peer.config,
    createdAt: peer.createdAtM,
  }
}
