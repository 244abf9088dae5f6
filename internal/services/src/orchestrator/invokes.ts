import type { PeerRecord, Subscription } from "@peerline/db/validators"
import { newId } from "@peerline/db/utils"
import type { BaseError, Result } from "@peerline/error"
import type { LedgerError } from "../ledger"
import { handleOf } from "../peers"
import { OrchestratorError } from "./errors"
import { isSubscriptionEntitled } from "./guards"
import {
  type IntentMachineContext,
  type ProvisioningIntent,
  type StepResult,
  committed,
  failed,
  rejected,
} from "./types"

function unwrap<T>(result: Result<T, BaseError>): T {
  if (result.err) throw result.err
  return result.val
}

function misrouted(context: IntentMachineContext, expected: ProvisioningIntent["kind"]): never {
  throw new OrchestratorError({
    code: "MISROUTED",
    message: `expected a ${expected} intent`,
    context: { kind: context.intent.kind, intentId: context.intent.intentId },
  })
}

function fields(context: IntentMachineContext) {
  return {
    userId: context.intent.userId,
    intentId: context.intent.intentId,
    idempotencyKey: context.intent.idempotencyKey,
  }
}

export function fromLedgerError(error: LedgerError): StepResult {
  switch (error.code) {
    case "NOT_FOUND":
      return rejected("NoSubscription")
    case "INVALID_EXTENSION":
    case "INVALID_CREDIT":
      return rejected("InvalidExtension")
    case "DUPLICATE_CREDIT":
      return rejected("DuplicateCredit")
    case "NOT_YET_EXPIRED":
      return rejected("NotYetExpired")
    case "TRIAL_ALREADY_USED":
      return rejected("TrialAlreadyUsed")
    case "STORAGE":
      return failed("StorageUnavailable")
  }
}

// the lock moved on; nothing more may be written and the user gets a reconciliation pass
function lockLost(context: IntentMachineContext, stage: string): StepResult {
  context.deps.logger.warn("lock lost before commit", { ...fields(context), stage })
  context.deps.divergence.enqueue(context.intent.userId, `lock lost before ${stage}`)
  return failed("LockLost")
}

async function stillHeld(context: IntentMachineContext): Promise<boolean> {
  const held = await context.lock.assertHeld()
  return !held.err
}

export async function loadSubscription(context: IntentMachineContext): Promise<Subscription | null> {
  const { val, err } = await context.deps.ledger.get(context.intent.userId)
  if (err) {
    if (err.code === "NOT_FOUND") return null
    throw err
  }
  return val
}

type RevokeOne =
  | { status: "revoked"; peer: PeerRecord }
  | { status: "unavailable" }
  | { status: "lost" }

/**
 * Removes the peer remotely, then marks it revoked. A pending record has no
 * remote id yet, so the appliance is searched by idempotency key.
 */
async function revokeOne(context: IntentMachineContext, peer: PeerRecord): Promise<RevokeOne> {
  const { deps, signal, now } = context

  let remoteId = peer.remoteId
  if (!remoteId) {
    const listed = await deps.gateway.listPeers({ userId: peer.userId, signal })
    if (listed.err) return { status: "unavailable" }
    remoteId = listed.val.find((p) => p.idempotencyKey === peer.idempotencyKey)?.remoteId ?? null
  }

  if (remoteId) {
    const removed = await deps.gateway.removePeer({ remoteId, signal })
    if (removed.err) return { status: "unavailable" }

    if (!removed.val.removed && peer.state === "active") {
      deps.logger.warn("active peer was already gone from the appliance", {
        ...fields(context),
        peerId: peer.id,
        remoteId,
      })
      deps.divergence.enqueue(peer.userId, "active peer missing remotely")
    }
  }

  if (!(await stillHeld(context))) return { status: "lost" }

  const updated = unwrap(
    await deps.peers.update({
      peerId: peer.id,
      patch: { state: "revoked", revokedAtM: now },
      now,
    })
  )

  if (!updated) {
    throw new OrchestratorError({
      code: "MACHINE",
      message: "peer disappeared during revocation",
      context: { ...fields(context), peerId: peer.id },
    })
  }

  deps.notify({ type: "peer.revoked", userId: peer.userId, peerId: peer.id, at: now })
  return { status: "revoked", peer: updated }
}

export async function issuePeer(context: IntentMachineContext): Promise<StepResult> {
  const { intent, subscription, deps, signal, now } = context
  if (intent.kind !== "issue") return misrouted(context, "issue")

  if (!subscription || !isSubscriptionEntitled(context)) return rejected("SubscriptionInactive")

  // a record left by an earlier attempt under the same key
  const existing = unwrap(await deps.peers.findByIdempotencyKey(intent.idempotencyKey))
  if (existing && existing.userId !== intent.userId) {
    deps.logger.warn("idempotency key belongs to another user's peer", fields(context))
    return rejected("IdempotencyConflict")
  }
  if (existing && existing.state !== "pending") {
    return committed({ peer: existing, handle: handleOf(existing) })
  }

  const active = unwrap(await deps.peers.countActive(intent.userId))
  if (!deps.quota.mayIssue(active, subscription.plan)) {
    deps.logger.info("peer quota reached", { ...fields(context), active, plan: subscription.plan })
    return rejected("QuotaExceeded")
  }

  let pending = existing
  if (!pending) {
    if (!(await stillHeld(context))) return lockLost(context, "pending write")

    pending = unwrap(
      await deps.peers.insert({
        id: newId("peer"),
        userId: intent.userId,
        remoteId: null,
        idempotencyKey: intent.idempotencyKey,
        state: "pending",
        label: intent.label ?? null,
        publicKey: null,
        config: null,
        revokedAtM: null,
        createdAtM: now,
        updatedAtM: now,
      })
    )
  }

  const added = await deps.gateway.addPeer({
    userId: intent.userId,
    idempotencyKey: intent.idempotencyKey,
    label: intent.label,
    signal,
    verifyFirst: existing !== null,
  })

  if (added.err) {
    if (await stillHeld(context)) unwrap(await deps.peers.delete(pending.id))
    // an earlier attempt, or a refused reply, may still have left the peer remotely
    deps.divergence.enqueue(intent.userId, `peer add failed: ${added.err.code.toLowerCase()}`)
    return failed("ProvisioningUnavailable")
  }

  // the peer exists remotely now; if the lock is gone the pending record is left for reconciliation
  if (!(await stillHeld(context))) return lockLost(context, "peer activation")

  const peer = unwrap(
    await deps.peers.update({
      peerId: pending.id,
      patch: {
        state: "active",
        remoteId: added.val.remoteId,
        publicKey: added.val.publicKey,
        config: added.val.config,
      },
      now,
    })
  )

  if (!peer) {
    throw new OrchestratorError({
      code: "MACHINE",
      message: "pending peer disappeared",
      context: { ...fields(context), peerId: pending.id },
    })
  }

  deps.notify({ type: "peer.issued", userId: intent.userId, peerId: peer.id, at: now })
  return committed({ peer, handle: added.val })
}

export async function renewSubscription(context: IntentMachineContext): Promise<StepResult> {
  const { intent, deps, now } = context
  if (intent.kind !== "renew") return misrouted(context, "renew")

  if (intent.plan) {
    const active = unwrap(await deps.peers.countActive(intent.userId))
    if (!deps.quota.fits(active, intent.plan)) return rejected("QuotaExceeded")
  }

  if (!(await stillHeld(context))) return lockLost(context, "renewal")

  const { val, err } = await deps.ledger.renew({
    userId: intent.userId,
    extensionSeconds: intent.extensionSeconds,
    plan: intent.plan,
    now,
  })
  if (err) return fromLedgerError(err)

  deps.notify({
    type: "subscription.renewed",
    userId: intent.userId,
    activeUntil: val.activeUntil,
    at: now,
  })
  return committed({ subscription: val })
}

export async function revokePeer(context: IntentMachineContext): Promise<StepResult> {
  const { intent, deps } = context
  if (intent.kind !== "revoke") return misrouted(context, "revoke")

  const peer = unwrap(await deps.peers.find(intent.peerId))
  if (!peer || peer.userId !== intent.userId) return rejected("PeerNotFound")

  // already revoked: nothing to do remotely
  if (peer.state === "revoked") return committed({ peer })

  const result = await revokeOne(context, peer)
  switch (result.status) {
    case "lost":
      return lockLost(context, "revocation")
    case "unavailable":
      return failed("ProvisioningUnavailable")
    case "revoked":
      return committed({ peer: result.peer })
  }
}

export async function expireSubscription(context: IntentMachineContext): Promise<StepResult> {
  const { intent, subscription, deps, now } = context
  if (intent.kind !== "expire") return misrouted(context, "expire")
  if (!subscription) return rejected("NoSubscription")

  // re-checked under the lock, the sweep's listing may be stale
  if (subscription.status === "expired") return committed({ subscription })
  if (now < subscription.activeUntil) return rejected("NotYetExpired")

  const live = unwrap(
    await deps.peers.listByUser({ userId: intent.userId, states: ["pending", "active"] })
  )

  const unresolved: string[] = []
  for (const peer of live) {
    const result = await revokeOne(context, peer)
    if (result.status === "lost") return lockLost(context, "expiry")
    if (result.status === "unavailable") unresolved.push(peer.id)
  }

  if (!(await stillHeld(context))) return lockLost(context, "expiry")

  if (unresolved.length > 0) {
    const grace = await deps.ledger.markGrace({ userId: intent.userId, now })
    if (grace.err) return fromLedgerError(grace.err)

    deps.logger.warn("expiry left peers unresolved", {
      ...fields(context),
      unresolved: unresolved.length,
      revoked: live.length - unresolved.length,
    })
    deps.notify({
      type: "subscription.grace",
      userId: intent.userId,
      unresolvedPeers: unresolved,
      at: now,
    })
    return failed("ProvisioningUnavailable", unresolved)
  }

  const { val, err } = await deps.ledger.expire({ userId: intent.userId, now })
  if (err) return fromLedgerError(err)

  deps.notify({ type: "subscription.expired", userId: intent.userId, at: now })
  return committed({ subscription: val })
}

export async function activateSubscription(context: IntentMachineContext): Promise<StepResult> {
  const { intent, subscription, deps, now } = context
  if (intent.kind !== "activate") return misrouted(context, "activate")

  if (subscription && subscription.plan !== intent.plan) {
    const active = unwrap(await deps.peers.countActive(intent.userId))
    if (!deps.quota.fits(active, intent.plan)) return rejected("QuotaExceeded")
  }

  if (!(await stillHeld(context))) return lockLost(context, "activation")

  const { val, err } = await deps.ledger.activate({
    userId: intent.userId,
    plan: intent.plan,
    extensionSeconds: intent.extensionSeconds,
    now,
  })
  if (err) return fromLedgerError(err)

  deps.notify({
    type: "subscription.renewed",
    userId: intent.userId,
    activeUntil: val.activeUntil,
    at: now,
  })
  return committed({ subscription: val })
}

export async function creditSubscription(context: IntentMachineContext): Promise<StepResult> {
  const { intent, deps, now } = context
  if (intent.kind !== "credit") return misrouted(context, "credit")

  if (!(await stillHeld(context))) return lockLost(context, "credit")

  const { val, err } = await deps.ledger.applyReferralCredit({
    userId: intent.userId,
    creditEventId: intent.creditEventId,
    seconds: intent.seconds,
    now,
  })
  if (err) return fromLedgerError(err)

  deps.notify({
    type: "referral.credited",
    userId: intent.userId,
    seconds: intent.seconds,
    at: now,
  })
  return committed({ subscription: val })
}
