export const PLAN_TIERS = ["trial", "standard", "premium"] as const

export type PlanTier = (typeof PLAN_TIERS)[number]

export const DEFAULT_MAX_PEERS_PER_USER = 3

// trial is always a single device, premium doubles the standard allowance
export function planPeerLimit(plan: PlanTier, maxPeersPerUser = DEFAULT_MAX_PEERS_PER_USER): number {
  switch (plan) {
    case "trial":
      return 1
    case "standard":
      return maxPeersPerUser
    case "premium":
      return maxPeersPerUser * 2
  }
}

export const SECONDS_PER_DAY = 86_400
