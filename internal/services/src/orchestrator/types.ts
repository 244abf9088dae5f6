import type { PlanTier } from "@peerline/config"
import type { IntentKind, PeerHandle, PeerRecord, Subscription } from "@peerline/db/validators"
import type { Logger } from "@peerline/logging"
import type { ProvisioningGateway } from "../gateway"
import type { SubscriptionLedger } from "../ledger"
import type { Lock } from "../locks"
import type { NotificationEvent } from "../notifications"
import type { PeerRepository } from "../peers"
import type { QuotaPolicy } from "../quota"
import type { DivergenceQueue } from "../reconciliation/queue"

type IntentBase = {
  readonly intentId: string
  readonly userId: string
  readonly idempotencyKey: string
  readonly requestedAt: number
}

export type IssueIntent = IntentBase & { readonly kind: "issue"; readonly label?: string | null }

export type RenewIntent = IntentBase & {
  readonly kind: "renew"
  readonly extensionSeconds: number
  readonly plan?: Exclude<PlanTier, "trial">
}

export type RevokeIntent = IntentBase & { readonly kind: "revoke"; readonly peerId: string }

export type ExpireIntent = IntentBase & { readonly kind: "expire" }

export type ActivateIntent = IntentBase & {
  readonly kind: "activate"
  readonly plan: PlanTier
  readonly extensionSeconds: number
}

export type CreditIntent = IntentBase & {
  readonly kind: "credit"
  readonly creditEventId: string
  readonly seconds: number
}

export type ProvisioningIntent =
  | IssueIntent
  | RenewIntent
  | RevokeIntent
  | ExpireIntent
  | ActivateIntent
  | CreditIntent

export const REJECT_REASONS = [
  "NoSubscription",
  "SubscriptionInactive",
  "QuotaExceeded",
  "LockTimeout",
  "InvalidExtension",
  "DuplicateCredit",
  "NotYetExpired",
  "PeerNotFound",
  "TrialAlreadyUsed",
  "IdempotencyConflict",
] as const

export const FAIL_REASONS = ["ProvisioningUnavailable", "LockLost", "StorageUnavailable"] as const

export type RejectReason = (typeof REJECT_REASONS)[number]
export type FailReason = (typeof FAIL_REASONS)[number]

export function isRejectReason(value: string | null): value is RejectReason {
  return REJECT_REASONS.some((reason) => reason === value)
}

type OutcomeBase = {
  intentId: string
  idempotencyKey: string
  userId: string
  kind: IntentKind
  // answered from a recorded outcome without running again
  replayed: boolean
}

export type Outcome =
  | (OutcomeBase & {
      status: "committed"
      peer: PeerRecord | null
      handle: PeerHandle | null
      subscription: Subscription | null
    })
  | (OutcomeBase & { status: "rejected"; reason: RejectReason })
  | (OutcomeBase & {
      status: "failed"
      reason: FailReason
      retryable: true
      unresolvedPeers: string[]
    })

export type StepResult =
  | {
      type: "committed"
      peer: PeerRecord | null
      handle: PeerHandle | null
      subscription: Subscription | null
    }
  | { type: "rejected"; reason: RejectReason }
  | { type: "failed"; reason: FailReason; unresolvedPeers: string[] }

export function committed(
  values: Partial<{
    peer: PeerRecord | null
    handle: PeerHandle | null
    subscription: Subscription | null
  }> = {}
): StepResult {
  return {
    type: "committed",
    peer: values.peer ?? null,
    handle: values.handle ?? null,
    subscription: values.subscription ?? null,
  }
}

export function rejected(reason: RejectReason): StepResult {
  return { type: "rejected", reason }
}

export function failed(reason: FailReason, unresolvedPeers: string[] = []): StepResult {
  return { type: "failed", reason, unresolvedPeers }
}

export type IntentDeps = {
  ledger: SubscriptionLedger
  peers: PeerRepository
  gateway: ProvisioningGateway
  quota: QuotaPolicy
  divergence: DivergenceQueue
  notify: (event: NotificationEvent) => void
  logger: Logger
}

export type IntentMachineInput = {
  intent: ProvisioningIntent
  lock: Lock
  now: number
  signal: AbortSignal
  deps: IntentDeps
}

export type IntentMachineContext = IntentMachineInput & {
  subscription: Subscription | null
  result: StepResult | null
}

export type IntentMachineTag = "working" | "final"
