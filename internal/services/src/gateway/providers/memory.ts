import type { PeerHandle } from "@peerline/db/validators"
import { Err, FetchError, Ok, type Result } from "@peerline/error"
import type { VpnControlPlane } from "../control-plane"

export type ControlPlaneOperation = "addPeer" | "removePeer" | "listPeers"

/**
 * unavailable: transient error. rejected: permanent error.
 * timeout: hangs until the caller aborts.
 * `applied` makes the call take effect before the error is reported.
 */
export type ControlPlaneFault = {
  kind: "unavailable" | "rejected" | "timeout"
  applied?: boolean
}

export type ControlPlaneCall = {
  operation: ControlPlaneOperation
  phase: "start" | "end"
  userId?: string
  remoteId?: string
}

/**
 * In-process appliance with scripted faults and latency
 */
export class MemoryVpnControlPlane implements VpnControlPlane {
  readonly name = "memory"
  readonly deduplicates: boolean
  readonly peers = new Map<string, PeerHandle>()
  readonly calls: ControlPlaneCall[] = []
  private readonly faults = new Map<ControlPlaneOperation, ControlPlaneFault[]>()
  private readonly delays = new Map<ControlPlaneOperation, number>()
  private seq = 0

  constructor({ deduplicates = false }: { deduplicates?: boolean } = {}) {
    this.deduplicates = deduplicates
  }

  public fail(operation: ControlPlaneOperation, fault: ControlPlaneFault, times = 1): void {
    const queue = this.faults.get(operation) ?? []
    for (let i = 0; i < times; i++) queue.push(fault)
    this.faults.set(operation, queue)
  }

  public delay(operation: ControlPlaneOperation, ms: number): void {
    this.delays.set(operation, ms)
  }

  /**
   * Puts a peer on the appliance without going through addPeer
   */
  public seed(peer: { userId: string; idempotencyKey?: string | null; remoteId?: string }): PeerHandle {
    return this.create(peer.userId, peer.idempotencyKey ?? null, peer.remoteId)
  }

  public peersOf(userId: string): PeerHandle[] {
    return [...this.peers.values()].filter((p) => p.userId === userId)
  }

  public count(operation: ControlPlaneOperation): number {
    return this.calls.filter((c) => c.operation === operation && c.phase === "start").length
  }

  private create(userId: string, idempotencyKey: string | null, remoteId?: string): PeerHandle {
    this.seq++
    const handle: PeerHandle = {
      remoteId: remoteId ?? `rp_${this.seq}`,
      userId,
      idempotencyKey,
      publicKey: `pk-${this.seq}`,
      config: `[Interface]\nAddress = 10.8.0.${this.seq}/32`,
      createdAt: Date.now(),
    }
    this.peers.set(handle.remoteId, handle)
    return handle
  }

  private wait(operation: ControlPlaneOperation, signal?: AbortSignal): Promise<void> {
    const ms = this.delays.get(operation) ?? 0
    if (ms <= 0) return Promise.resolve()
    return new Promise((resolve) => {
      const timer = setTimeout(resolve, ms)
      signal?.addEventListener(
        "abort",
        () => {
          clearTimeout(timer)
          resolve()
        },
        { once: true }
      )
    })
  }

  private hang(signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (!signal || signal.aborted) return resolve()
      signal.addEventListener("abort", () => resolve(), { once: true })
    })
  }

  private error(operation: ControlPlaneOperation, fault: ControlPlaneFault): FetchError {
    return new FetchError({
      message: `${operation} ${fault.kind}`,
      retry: fault.kind !== "rejected",
      context: { url: this.name, method: operation },
    })
  }

  private async perform<T>(
    call: Omit<ControlPlaneCall, "phase">,
    signal: AbortSignal | undefined,
    apply: () => T
  ): Promise<Result<T, FetchError>> {
    this.calls.push({ ...call, phase: "start" })
    try {
      await this.wait(call.operation, signal)
      if (signal?.aborted) {
        return Err(this.error(call.operation, { kind: "timeout" }))
      }

      const fault = this.faults.get(call.operation)?.shift()
      if (!fault) return Ok(apply())

      if (fault.applied) apply()
      if (fault.kind === "timeout") await this.hang(signal)
      return Err(this.error(call.operation, fault))
    } finally {
      this.calls.push({ ...call, phase: "end" })
    }
  }

  async addPeer({
    userId,
    idempotencyKey,
    signal,
  }: {
    userId: string
    idempotencyKey: string
    label?: string | null
    signal?: AbortSignal
  }): Promise<Result<PeerHandle, FetchError>> {
    return this.perform({ operation: "addPeer", userId }, signal, () => {
      if (this.deduplicates) {
        const existing = [...this.peers.values()].find((p) => p.idempotencyKey === idempotencyKey)
        if (existing) return existing
      }
      return this.create(userId, idempotencyKey)
    })
  }

  async removePeer({
    remoteId,
    signal,
  }: {
    remoteId: string
    signal?: AbortSignal
  }): Promise<Result<{ removed: boolean }, FetchError>> {
    return this.perform({ operation: "removePeer", remoteId }, signal, () => ({
      removed: this.peers.delete(remoteId),
    }))
  }

  async listPeers({
    userId,
    signal,
  }: {
    userId: string
    signal?: AbortSignal
  }): Promise<Result<PeerHandle[], FetchError>> {
    return this.perform({ operation: "listPeers", userId }, signal, () => this.peersOf(userId))
  }
}
