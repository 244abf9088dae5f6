import { z } from "zod"

import {
  INTENT_KINDS,
  INTENT_STATUS,
  PEER_STATES,
  PLAN_TIERS,
  SUBSCRIPTION_STATUS,
} from "../utils/constants"

export const planTierSchema = z.enum(PLAN_TIERS)
export const subscriptionStatusSchema = z.enum(SUBSCRIPTION_STATUS)
export const peerStateSchema = z.enum(PEER_STATES)
export const intentKindSchema = z.enum(INTENT_KINDS)
export const intentStatusSchema = z.enum(INTENT_STATUS)

export type PlanTier = z.infer<typeof planTierSchema>
export type SubscriptionStatus = z.infer<typeof subscriptionStatusSchema>
export type PeerState = z.infer<typeof peerStateSchema>
export type IntentKind = z.infer<typeof intentKindSchema>
export type IntentStatus = z.infer<typeof intentStatusSchema>
