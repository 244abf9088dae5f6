export { PLAN_TIERS } from "@peerline/config"

// trial and active are entitled to peers while inside their window,
// grace means expired but with peers still waiting for remote removal
export const SUBSCRIPTION_STATUS = ["trial", "active", "grace", "expired"] as const

export const PEER_STATES = ["pending", "active", "revoked"] as const

export const INTENT_KINDS = ["issue", "renew", "revoke", "expire", "activate", "credit"] as const

export const INTENT_STATUS = ["committed", "rejected"] as const
