import { newId } from "@peerline/db/utils"
import type { ProvisioningIntent } from "./types"

type Generated = "intentId" | "requestedAt" | "idempotencyKey"

type WithGenerated<T> = T extends ProvisioningIntent
  ? Omit<T, Generated> & Partial<Pick<T, Generated>>
  : never

export type IntentInput = WithGenerated<ProvisioningIntent>

/**
 * Builds a frozen intent. Without an idempotency key the intent id is used,
 * so only the exact same value replays.
 */
export function createIntent(input: IntentInput, now = Date.now()): ProvisioningIntent {
  const intentId = input.intentId ?? newId("intent")
  return Object.freeze({
    ...input,
    intentId,
    requestedAt: input.requestedAt ?? now,
    idempotencyKey: input.idempotencyKey ?? intentId,
  })
}
