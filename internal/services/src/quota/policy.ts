import { DEFAULT_MAX_PEERS_PER_USER, type PlanTier, planPeerLimit } from "@peerline/config"

/**
 * Whether one more peer fits under the limit.
 */
export function mayIssue(activePeerCount: number, planLimit: number): boolean {
  return activePeerCount < planLimit
}

export class QuotaPolicy {
  private readonly maxPeersPerUser: number

  constructor({ maxPeersPerUser = DEFAULT_MAX_PEERS_PER_USER }: { maxPeersPerUser?: number } = {}) {
    this.maxPeersPerUser = maxPeersPerUser
  }

  public limitFor(plan: PlanTier): number {
    return planPeerLimit(plan, this.maxPeersPerUser)
  }

  public mayIssue(activePeerCount: number, plan: PlanTier): boolean {
    return mayIssue(activePeerCount, this.limitFor(plan))
  }

  // a plan change must not leave more active peers than the new plan allows
  public fits(activePeerCount: number, plan: PlanTier): boolean {
    return activePeerCount <= this.limitFor(plan)
  }
}
