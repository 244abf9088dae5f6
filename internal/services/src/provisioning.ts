import type { Logger } from "@peerline/logging"
import { type RetryPolicyOptions, ProvisioningGateway, RetryPolicy, type VpnControlPlane } from "./gateway"
import { type SubscriptionRepository, SubscriptionLedger } from "./ledger"
import { LockManager, type LockStore } from "./locks"
import type { NotificationSink } from "./notifications"
import { type IntentStore, ProvisioningOrchestrator } from "./orchestrator"
import type { PeerRepository } from "./peers"
import { QuotaPolicy } from "./quota"
import { DivergenceQueue, type DivergenceStore, Reconciler } from "./reconciliation"
import { type ReferralRepository, ReferralService } from "./referrals"
import { ExpiryScheduler } from "./scheduler"

export type ProvisioningStores = {
  subscriptions: SubscriptionRepository
  peers: PeerRepository
  intents: IntentStore
  locks: LockStore
  referrals: ReferralRepository
  divergence: DivergenceStore
}

export type ProvisioningSettings = {
  maxPeersPerUser: number
  gatewayTimeoutMs: number
  retry: RetryPolicyOptions
  lockTtlMs: number
  lockWaitMs: number
  lockPollMs?: number
  heartbeat?: boolean
  intentTimeoutMs: number
  sweepBatch: number
  pendingGraceMs?: number
}

/**
 * Wires every component over the given stores and appliance
 */
export function createProvisioning({
  stores,
  controlPlane,
  notifications,
  logger,
  settings,
  waitUntil,
  clock = Date.now,
}: {
  stores: ProvisioningStores
  controlPlane: VpnControlPlane
  notifications: NotificationSink
  logger: Logger
  settings: ProvisioningSettings
  waitUntil: (promise: Promise<unknown>) => void
  clock?: () => number
}) {
  const ledger = new SubscriptionLedger({ repository: stores.subscriptions, logger })
  const quota = new QuotaPolicy({ maxPeersPerUser: settings.maxPeersPerUser })
  const divergence = new DivergenceQueue({
    store: stores.divergence,
    logger,
    waitUntil,
    clock,
  })

  const gateway = new ProvisioningGateway({
    controlPlane,
    retry: new RetryPolicy(settings.retry),
    timeoutMs: settings.gatewayTimeoutMs,
    logger,
  })

  const locks = new LockManager({
    store: stores.locks,
    logger,
    clock,
    ttlMs: settings.lockTtlMs,
    waitMs: settings.lockWaitMs,
    pollMs: settings.lockPollMs,
    heartbeat: settings.heartbeat,
  })

  const orchestrator = new ProvisioningOrchestrator({
    ledger,
    peers: stores.peers,
    gateway,
    locks,
    intents: stores.intents,
    quota,
    divergence,
    notifications,
    logger,
    waitUntil,
    clock,
    intentTimeoutMs: settings.intentTimeoutMs,
  })

  const reconciler = new Reconciler({
    ledger,
    peers: stores.peers,
    gateway,
    locks,
    quota,
    divergence,
    logger,
    clock,
    pendingGraceMs: settings.pendingGraceMs ?? settings.lockTtlMs,
  })

  const scheduler = new ExpiryScheduler({
    ledger,
    orchestrator,
    logger,
    clock,
    batchSize: settings.sweepBatch,
  })

  const referrals = new ReferralService({
    repository: stores.referrals,
    ledger,
    orchestrator,
    logger,
  })

  return {
    ledger,
    peers: stores.peers,
    quota,
    gateway,
    locks,
    divergence,
    orchestrator,
    reconciler,
    scheduler,
    referrals,
  }
}

export type Provisioning = ReturnType<typeof createProvisioning>
