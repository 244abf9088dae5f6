import type { PeerHandle, PeerRecord } from "@peerline/db/validators"
import { isEntitled } from "@peerline/db/validators"
import { type BaseError, Err, Ok, type Result } from "@peerline/error"
import type { Logger } from "@peerline/logging"
import type { ProvisioningGateway } from "../gateway"
import type { SubscriptionLedger } from "../ledger"
import type { Lock, LockManager } from "../locks"
import type { PeerRepository } from "../peers"
import type { QuotaPolicy } from "../quota"
import { ReconciliationError } from "./errors"
import type { DivergenceQueue } from "./queue"

export type ReconcileReport = {
  userId: string
  diverged: boolean
  // stale pending records promoted because their peer exists remotely
  adopted: number
  removedRemote: number
  revokedLocal: number
  droppedPending: number
  // remote removals that failed and are left for the next pass
  failures: number
}

export type SweepReport = {
  checked: number
  diverged: number
  repaired: number
  busy: number
  failed: number
}

/**
 * Brings local peer records and the appliance back in line. The comparison
 * runs without the lock; repairs run under it.
 */
export class Reconciler {
  private readonly ledger: SubscriptionLedger
  private readonly peers: PeerRepository
  private readonly gateway: ProvisioningGateway
  private readonly locks: LockManager
  private readonly quota: QuotaPolicy
  private readonly divergence: DivergenceQueue
  private readonly logger: Logger
  private readonly clock: () => number
  private readonly pendingGraceMs: number

  constructor({
    ledger,
    peers,
    gateway,
    locks,
    quota,
    divergence,
    logger,
    clock = Date.now,
    pendingGraceMs = 30_000,
  }: {
    ledger: SubscriptionLedger
    peers: PeerRepository
    gateway: ProvisioningGateway
    locks: LockManager
    quota: QuotaPolicy
    divergence: DivergenceQueue
    logger: Logger
    clock?: () => number
    pendingGraceMs?: number
  }) {
    this.ledger = ledger
    this.peers = peers
    this.gateway = gateway
    this.locks = locks
    this.quota = quota
    this.divergence = divergence
    this.logger = logger
    this.clock = clock
    this.pendingGraceMs = pendingGraceMs
  }

  private report(userId: string, diverged: boolean): ReconcileReport {
    return {
      userId,
      diverged,
      adopted: 0,
      removedRemote: 0,
      revokedLocal: 0,
      droppedPending: 0,
      failures: 0,
    }
  }

  private diverges(remote: PeerHandle[], local: PeerRecord[]): boolean {
    if (local.some((peer) => peer.state === "pending")) return true

    const activeRemoteIds = new Set(
      local.filter((peer) => peer.state === "active").map((peer) => peer.remoteId)
    )
    if (remote.length !== activeRemoteIds.size) return true
    return remote.some((handle) => !activeRemoteIds.has(handle.remoteId))
  }

  private isStale(peer: PeerRecord, now: number): boolean {
    return peer.createdAtM + this.pendingGraceMs <= now
  }

  private fail(
    code: ReconciliationError["code"],
    userId: string,
    message: string,
    cause?: BaseError
  ) {
    return Err(new ReconciliationError({ code, message, userId, cause }))
  }

  private async repair(
    userId: string,
    lock: Lock
  ): Promise<Result<ReconcileReport, ReconciliationError>> {
    const now = this.clock()
    const report = this.report(userId, true)

    // both sides again, now that nobody else can change them
    const remote = await this.gateway.listPeers({ userId })
    if (remote.err) return this.fail("REMOTE", userId, "appliance unavailable", remote.err)

    const local = await this.peers.listByUser({ userId })
    if (local.err) return this.fail("STORAGE", userId, "peer store unavailable", local.err)

    const subscription = await this.ledger.get(userId)
    if (subscription.err && subscription.err.code !== "NOT_FOUND") {
      return this.fail("STORAGE", userId, "subscription store unavailable", subscription.err)
    }

    const entitled = subscription.val ? isEntitled(subscription.val, now) : false
    const limit = subscription.val ? this.quota.limitFor(subscription.val.plan) : 0

    const activeByRemoteId = new Map<string, PeerRecord>()
    const pendingByKey = new Map<string, PeerRecord>()
    for (const peer of local.val) {
      if (peer.state === "active" && peer.remoteId) activeByRemoteId.set(peer.remoteId, peer)
      if (peer.state === "pending") pendingByKey.set(peer.idempotencyKey, peer)
    }

    let activeCount = activeByRemoteId.size
    const settledPending = new Set<string>()

    const write = async <T>(result: Promise<Result<T, BaseError>>) => {
      const held = await lock.assertHeld()
      if (held.err) return this.fail("LOST", userId, "lock lost during repair", held.err)
      const written = await result
      if (written.err) return this.fail("STORAGE", userId, "peer store unavailable", written.err)
      return Ok(written.val)
    }

    for (const handle of remote.val) {
      if (activeByRemoteId.has(handle.remoteId)) continue

      const pending = handle.idempotencyKey ? pendingByKey.get(handle.idempotencyKey) : undefined

      if (pending) {
        settledPending.add(pending.id)
        // the issue that wrote it may still be running
        if (!this.isStale(pending, now)) continue

        if (entitled && activeCount < limit) {
          const adopted = await write(
            this.peers.update({
              peerId: pending.id,
              patch: {
                state: "active",
                remoteId: handle.remoteId,
                publicKey: handle.publicKey,
                config: handle.config,
              },
              now,
            })
          )
          if (adopted.err) return adopted
          activeCount++
          report.adopted++
          continue
        }
      }

      // orphan: nothing local accounts for it
      const removed = await this.gateway.removePeer({ remoteId: handle.remoteId })
      if (removed.err) {
        report.failures++
        continue
      }
      report.removedRemote++

      if (pending) {
        const dropped = await write(this.peers.delete(pending.id))
        if (dropped.err) return dropped
        report.droppedPending++
      }
    }

    const remoteIds = new Set(remote.val.map((handle) => handle.remoteId))
    for (const [remoteId, peer] of activeByRemoteId) {
      if (remoteIds.has(remoteId)) continue

      const revoked = await write(
        this.peers.update({ peerId: peer.id, patch: { state: "revoked", revokedAtM: now }, now })
      )
      if (revoked.err) return revoked
      report.revokedLocal++
    }

    for (const pending of pendingByKey.values()) {
      if (settledPending.has(pending.id) || !this.isStale(pending, now)) continue

      // never reached the appliance
      const dropped = await write(this.peers.delete(pending.id))
      if (dropped.err) return dropped
      report.droppedPending++
    }

    this.logger.info("peers reconciled", { ...report })
    return Ok(report)
  }

  /**
   * One pass for one user: a read-only comparison, then a locked repair if
   * the two sides disagree
   */
  public async reconcileUser(userId: string): Promise<Result<ReconcileReport, ReconciliationError>> {
    const checkedAt = this.clock()

    const remote = await this.gateway.listPeers({ userId })
    if (remote.err) return this.fail("REMOTE", userId, "appliance unavailable", remote.err)

    const local = await this.peers.listByUser({ userId, states: ["pending", "active"] })
    if (local.err) return this.fail("STORAGE", userId, "peer store unavailable", local.err)

    if (!this.diverges(remote.val, local.val)) {
      this.divergence.resolve(userId, checkedAt)
      return Ok(this.report(userId, false))
    }

    this.logger.info("peer divergence found", {
      userId,
      remote: remote.val.length,
      local: local.val.length,
    })

    const repaired = await this.locks.withLock(userId, (lock) => this.repair(userId, lock), {
      waitMs: 0,
    })

    if (repaired.err) {
      this.divergence.enqueue(userId, "reconciliation could not take the lock")
      return repaired.err.code === "BUSY"
        ? this.fail("BUSY", userId, "user locked, retried next sweep", repaired.err)
        : this.fail("STORAGE", userId, "lock store unavailable", repaired.err)
    }

    const { val: report, err } = repaired.val
    if (err) {
      this.divergence.enqueue(userId, "repair interrupted")
      return repaired.val
    }

    // partial repair, try again next sweep
    if (report.failures > 0) this.divergence.enqueue(userId, "orphan removal failed")
    else this.divergence.resolve(userId, checkedAt)

    return repaired.val
  }

  /**
   * Checks every flagged user, then every user holding live peers
   */
  public async sweep({ limit = 500 }: { limit?: number } = {}): Promise<SweepReport> {
    const queued = this.divergence.drain(limit)

    const flagged = await this.divergence.flagged({ limit })
    if (flagged.err) {
      this.logger.error("could not list flagged users", { error: flagged.err.message })
    }

    const listed = await this.peers.listUsersWithPeers({ limit })
    if (listed.err) {
      this.logger.error("could not list users with peers", { error: listed.err.message })
    }

    const users = [...new Set([...queued, ...(flagged.val ?? []), ...(listed.val ?? [])])]
    const summary: SweepReport = { checked: 0, diverged: 0, repaired: 0, busy: 0, failed: 0 }

    for (const userId of users) {
      summary.checked++
      const { val, err } = await this.reconcileUser(userId)

      if (err) {
        if (err.code === "BUSY") summary.busy++
        else summary.failed++
        continue
      }

      if (val.diverged) {
        summary.diverged++
        if (val.failures === 0) summary.repaired++
      }
    }

    this.logger.info("reconciliation sweep finished", { ...summary })
    return summary
  }
}
