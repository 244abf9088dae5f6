import { env } from "@peerline/config/env"
import type { Database } from "@peerline/db"
import type { Logger } from "@peerline/logging"
import { HttpVpnControlPlane } from "./gateway"
import { DrizzleSubscriptionRepository } from "./ledger"
import { DrizzleLockStore } from "./locks"
import { LoggerNotificationSink, type NotificationSink } from "./notifications"
import { DrizzleIntentStore } from "./orchestrator"
import { DrizzlePeerRepository } from "./peers"
import { createProvisioning } from "./provisioning"
import { DrizzleDivergenceStore } from "./reconciliation"
import { DrizzleReferralRepository } from "./referrals"

/**
 * Production wiring: Postgres stores and the appliance's HTTP API, tuned
 * from the environment
 */
export function createProvisioningContext({
  db,
  logger,
  waitUntil,
  notifications = new LoggerNotificationSink({ logger }),
}: {
  db: Database
  logger: Logger
  waitUntil: (promise: Promise<unknown>) => void
  notifications?: NotificationSink
}) {
  return createProvisioning({
    stores: {
      subscriptions: new DrizzleSubscriptionRepository({ db, logger }),
      peers: new DrizzlePeerRepository({ db, logger }),
      intents: new DrizzleIntentStore({ db, logger }),
      locks: new DrizzleLockStore({ db }),
      referrals: new DrizzleReferralRepository({ db, logger }),
      divergence: new DrizzleDivergenceStore({ db, logger }),
    },
    controlPlane: new HttpVpnControlPlane({
      baseUrl: env.VPN_API_URL,
      token: env.VPN_API_TOKEN,
      deduplicates: env.VPN_API_IDEMPOTENT,
      logger,
    }),
    notifications,
    logger,
    waitUntil,
    settings: {
      maxPeersPerUser: env.MAX_PEERS_PER_USER,
      gatewayTimeoutMs: env.VPN_API_TIMEOUT_MS,
      retry: {
        maxAttempts: env.PROVISIONING_MAX_ATTEMPTS,
        baseDelayMs: env.PROVISIONING_BASE_DELAY_MS,
        maxDelayMs: env.PROVISIONING_MAX_DELAY_MS,
      },
      lockTtlMs: env.LOCK_TTL_MS,
      lockWaitMs: env.LOCK_WAIT_MS,
      intentTimeoutMs: env.INTENT_TIMEOUT_MS,
      sweepBatch: env.EXPIRY_SWEEP_BATCH,
    },
  })
}
