import type { Subscription } from "@peerline/db/validators"
import { NoopLogger } from "@peerline/logging"
import { MemoryVpnControlPlane } from "./gateway"
import { MemorySubscriptionRepository } from "./ledger"
import { MemoryLockStore } from "./locks"
import type { NotificationEvent, NotificationSink } from "./notifications"
import { type IntentInput, MemoryIntentStore, createIntent } from "./orchestrator"
import { MemoryPeerRepository } from "./peers"
import { type ProvisioningSettings, createProvisioning } from "./provisioning"
import { MemoryDivergenceStore } from "./reconciliation"
import { MemoryReferralRepository } from "./referrals"

/**
 * Creates a virtual clock for deterministic time-based testing.
 */
export const createClock = (initialTime: number) => {
  let currentTime = initialTime
  return {
    now: () => currentTime,
    advanceBy: (ms: number) => {
      currentTime += ms
    },
    set: (time: number) => {
      currentTime = time
    },
  }
}

export class RecordingNotificationSink implements NotificationSink {
  readonly events: NotificationEvent[] = []

  async publish(event: NotificationEvent): Promise<void> {
    this.events.push(event)
  }
}

/**
 * Every component over in-memory stores and appliance. Gateway retries do
 * not back off and locks wait long enough for a burst of intents.
 */
export const createMemoryProvisioning = ({
  now = Date.now(),
  deduplicates = false,
  settings = {},
}: {
  now?: number
  deduplicates?: boolean
  settings?: Partial<ProvisioningSettings>
} = {}) => {
  const clock = createClock(now)
  const controlPlane = new MemoryVpnControlPlane({ deduplicates })
  const notifications = new RecordingNotificationSink()
  const pending: Promise<unknown>[] = []

  const stores = {
    subscriptions: new MemorySubscriptionRepository(),
    peers: new MemoryPeerRepository(),
    intents: new MemoryIntentStore(),
    locks: new MemoryLockStore(),
    referrals: new MemoryReferralRepository(),
    divergence: new MemoryDivergenceStore(),
  }

  const provisioning = createProvisioning({
    stores,
    controlPlane,
    notifications,
    logger: new NoopLogger(),
    clock: clock.now,
    waitUntil: (promise) => {
      pending.push(promise)
    },
    settings: {
      maxPeersPerUser: 2,
      gatewayTimeoutMs: 1_000,
      retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
      lockTtlMs: 30_000,
      lockWaitMs: 2_000,
      lockPollMs: 1,
      heartbeat: false,
      intentTimeoutMs: 5_000,
      sweepBatch: 100,
      pendingGraceMs: 0,
      ...settings,
    },
  })

  return {
    ...provisioning,
    clock,
    controlPlane,
    notifications,
    stores,
    // resolves once every fire-and-forget notification has settled
    settle: () => Promise.allSettled(pending),
    submit: (input: IntentInput, opts?: { timeoutMs?: number }) =>
      provisioning.orchestrator.submitIntent(createIntent(input, clock.now()), opts),
  }
}

export type MemoryProvisioning = ReturnType<typeof createMemoryProvisioning>

/**
 * Factory for subscription rows, defaults to an active standard plan for 30 days
 */
export const createMockSubscription = (
  overrides: Partial<Subscription> & { userId: string },
  now = Date.now()
): Subscription => ({
  plan: "standard",
  status: "active",
  activeUntil: now + 30 * 24 * 60 * 60 * 1000,
  referralCreditSeconds: 0,
  trialUsed: false,
  expiredAt: null,
  createdAtM: now,
  updatedAtM: now,
  ...overrides,
})
