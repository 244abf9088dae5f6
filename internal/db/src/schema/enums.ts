import { pgEnum } from "drizzle-orm/pg-core"

import {
  INTENT_KINDS,
  INTENT_STATUS,
  PEER_STATES,
  PLAN_TIERS,
  SUBSCRIPTION_STATUS,
} from "../utils/constants"

export const planTierEnum = pgEnum("plan_tier", PLAN_TIERS)
export const subscriptionStatusEnum = pgEnum("subscription_status", SUBSCRIPTION_STATUS)
export const peerStateEnum = pgEnum("peer_state", PEER_STATES)
export const intentKindEnum = pgEnum("intent_kind", INTENT_KINDS)
export const intentStatusEnum = pgEnum("intent_status", INTENT_STATUS)
