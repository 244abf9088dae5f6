import type { IntentRecord, PeerRecord, Subscription } from "@peerline/db/validators"
import type { Fields, Logger } from "@peerline/logging"
import type { ProvisioningGateway } from "../gateway"
import type { SubscriptionLedger } from "../ledger"
import type { Lock, LockManager } from "../locks"
import type { NotificationEvent, NotificationSink } from "../notifications"
import { type PeerRepository, handleOf } from "../peers"
import type { QuotaPolicy } from "../quota"
import type { DivergenceQueue } from "../reconciliation/queue"
import { runIntentMachine } from "./machine"
import type { IntentStore } from "./store"
import {
  type IntentDeps,
  type Outcome,
  type ProvisioningIntent,
  type StepResult,
  failed,
  isRejectReason,
  rejected,
} from "./types"

/**
 * The single entry point for every change to subscriptions and peers.
 * Each intent runs under its user's lock, through the intent machine, and
 * ends as committed, rejected or failed.
 */
export class ProvisioningOrchestrator {
  private readonly ledger: SubscriptionLedger
  private readonly peers: PeerRepository
  private readonly locks: LockManager
  private readonly intents: IntentStore
  private readonly notifications: NotificationSink
  private readonly logger: Logger
  private readonly clock: () => number
  private readonly intentTimeoutMs: number
  private readonly waitUntil: (promise: Promise<unknown>) => void
  private readonly deps: IntentDeps

  constructor({
    ledger,
    peers,
    gateway,
    locks,
    intents,
    quota,
    divergence,
    notifications,
    logger,
    waitUntil,
    clock = Date.now,
    intentTimeoutMs = 60_000,
  }: {
    ledger: SubscriptionLedger
    peers: PeerRepository
    gateway: ProvisioningGateway
    locks: LockManager
    intents: IntentStore
    quota: QuotaPolicy
    divergence: DivergenceQueue
    notifications: NotificationSink
    logger: Logger
    waitUntil: (promise: Promise<unknown>) => void
    clock?: () => number
    intentTimeoutMs?: number
  }) {
    this.ledger = ledger
    this.peers = peers
    this.locks = locks
    this.intents = intents
    this.notifications = notifications
    this.logger = logger
    this.waitUntil = waitUntil
    this.clock = clock
    this.intentTimeoutMs = intentTimeoutMs
    this.deps = {
      ledger,
      peers,
      gateway,
      quota,
      divergence,
      logger,
      notify: (event) => this.notify(event),
    }
  }

  private notify(event: NotificationEvent): void {
    this.waitUntil(
      this.notifications.publish(event).catch((error: unknown) => {
        this.logger.warn("notification not delivered", {
          type: event.type,
          userId: event.userId,
          error: error instanceof Error ? error.message : "unknown",
        })
      })
    )
  }

  private toOutcome(intent: ProvisioningIntent, result: StepResult, replayed = false): Outcome {
    const base = {
      intentId: intent.intentId,
      idempotencyKey: intent.idempotencyKey,
      userId: intent.userId,
      kind: intent.kind,
      replayed,
    }

    switch (result.type) {
      case "committed":
        return {
          ...base,
          status: "committed",
          peer: result.peer,
          handle: result.handle,
          subscription: result.subscription,
        }
      case "rejected":
        return { ...base, status: "rejected", reason: result.reason }
      case "failed":
        return {
          ...base,
          status: "failed",
          reason: result.reason,
          retryable: true,
          unresolvedPeers: result.unresolvedPeers,
        }
    }
  }

  private log(intent: ProvisioningIntent, outcome: Outcome, startedAt: number): void {
    const fields: Fields = {
      userId: intent.userId,
      intentId: intent.intentId,
      idempotencyKey: intent.idempotencyKey,
      kind: intent.kind,
      status: outcome.status,
      replayed: outcome.replayed,
      durationMs: Date.now() - startedAt,
    }

    if (outcome.status === "committed") {
      this.logger.info("intent committed", { ...fields, peerId: outcome.peer?.id })
    } else if (outcome.status === "rejected") {
      this.logger.info("intent rejected", { ...fields, reason: outcome.reason })
    } else {
      this.logger.warn("intent failed", {
        ...fields,
        reason: outcome.reason,
        unresolvedPeers: outcome.unresolvedPeers,
      })
    }
  }

  // the recorded outcome for this key, rebuilt against current state
  private async replay(
    intent: ProvisioningIntent
  ): Promise<{ result: StepResult; replayed: boolean } | null> {
    const found = await this.intents.find(intent.idempotencyKey)
    if (found.err) return { result: failed("StorageUnavailable"), replayed: false }

    const record = found.val
    if (!record) return null

    // a key answers only the intent it was first used for
    if (record.userId !== intent.userId || record.kind !== intent.kind) {
      this.logger.warn("idempotency key reused by another intent", {
        userId: intent.userId,
        intentId: intent.intentId,
        idempotencyKey: intent.idempotencyKey,
        kind: intent.kind,
        recordedKind: record.kind,
      })
      return { result: rejected("IdempotencyConflict"), replayed: false }
    }

    if (record.status === "rejected") {
      return isRejectReason(record.reason)
        ? { result: rejected(record.reason), replayed: true }
        : null
    }

    let peer: PeerRecord | null = null
    if (record.peerId) {
      const loaded = await this.peers.find(record.peerId)
      if (loaded.err) return { result: failed("StorageUnavailable"), replayed: false }
      peer = loaded.val
    }

    let subscription: Subscription | null = null
    const current = await this.ledger.get(record.userId)
    if (current.val) subscription = current.val

    const handle = peer && intent.kind === "issue" ? handleOf(peer) : null
    return { result: { type: "committed", peer, handle, subscription }, replayed: true }
  }

  private async record(intent: ProvisioningIntent, result: StepResult, lock: Lock): Promise<void> {
    if (result.type === "failed") return
    // the key stays with whoever used it first
    if (result.type === "rejected" && result.reason === "IdempotencyConflict") return

    // a stale holder must not write either
    const held = await lock.assertHeld()
    if (held.err) {
      this.logger.warn("outcome not recorded, lock lost", {
        userId: intent.userId,
        intentId: intent.intentId,
      })
      return
    }

    const record: IntentRecord = {
      idempotencyKey: intent.idempotencyKey,
      intentId: intent.intentId,
      userId: intent.userId,
      kind: intent.kind,
      status: result.type,
      reason: result.type === "rejected" ? result.reason : null,
      peerId: result.type === "committed" ? (result.peer?.id ?? null) : null,
      createdAtM: this.clock(),
    }

    const { err } = await this.intents.record(record)
    if (err) {
      this.logger.error("outcome not recorded", {
        userId: intent.userId,
        intentId: intent.intentId,
        error: err.message,
      })
    }
  }

  private async process(
    intent: ProvisioningIntent,
    lock: Lock,
    signal: AbortSignal
  ): Promise<{ result: StepResult; replayed: boolean }> {
    const recorded = await this.replay(intent)
    if (recorded) return recorded

    // runs to a terminal state even past the deadline, the lock is held until then
    const run = await runIntentMachine({
      intent,
      lock,
      now: this.clock(),
      signal,
      deps: this.deps,
    })

    if (run.err) return { result: failed("StorageUnavailable"), replayed: false }

    // past the caller's deadline only a commit is reported as such
    if (signal.aborted && run.val.type !== "committed") {
      this.logger.warn("intent timed out", { userId: intent.userId, intentId: intent.intentId })
      this.deps.divergence.enqueue(intent.userId, "intent abandoned on timeout")
      return { result: rejected("LockTimeout"), replayed: false }
    }

    await this.record(intent, run.val, lock)
    return { result: run.val, replayed: false }
  }

  /**
   * Runs the intent and resolves once the user's lock is released again
   */
  public async submitIntent(
    intent: ProvisioningIntent,
    opts: { timeoutMs?: number } = {}
  ): Promise<Outcome> {
    const startedAt = Date.now()
    const timeoutMs = opts.timeoutMs ?? this.intentTimeoutMs
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const run = await this.locks.withLock(
        intent.userId,
        (lock) => this.process(intent, lock, controller.signal),
        { signal: controller.signal }
      )

      let outcome: Outcome
      if (run.err) {
        outcome = this.toOutcome(
          intent,
          run.err.code === "STORE" ? failed("StorageUnavailable") : rejected("LockTimeout")
        )
      } else {
        outcome = this.toOutcome(intent, run.val.result, run.val.replayed)
      }

      this.log(intent, outcome, startedAt)
      return outcome
    } finally {
      clearTimeout(timer)
      controller.abort()
    }
  }
}
