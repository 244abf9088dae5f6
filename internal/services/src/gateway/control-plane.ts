import type { PeerHandle } from "@peerline/db/validators"
import type { FetchError, Result } from "@peerline/error"

/**
 * The VPN appliance's control API. A FetchError with `retry` set means the
 * call may or may not have taken effect.
 */
export interface VpnControlPlane {
  readonly name: string

  // the appliance returns the existing peer when an add repeats an idempotency key
  readonly deduplicates: boolean

  addPeer(params: {
    userId: string
    idempotencyKey: string
    label?: string | null
    signal?: AbortSignal
  }): Promise<Result<PeerHandle, FetchError>>

  /**
   * `removed` is false when the appliance did not know the peer
   */
  removePeer(params: {
    remoteId: string
    signal?: AbortSignal
  }): Promise<Result<{ removed: boolean }, FetchError>>

  listPeers(params: { userId: string; signal?: AbortSignal }): Promise<
    Result<PeerHandle[], FetchError>
  >
}
