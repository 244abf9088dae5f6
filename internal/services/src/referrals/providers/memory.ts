import type { Referral } from "@peerline/db/validators"
import { Ok, type Result } from "@peerline/error"
import type { StorageError } from "../../errors"
import type { ReferralRepository } from "../repository"

export class MemoryReferralRepository implements ReferralRepository {
  readonly name = "memory"
  // invited user id -> referral
  private readonly memory = new Map<string, Referral>()

  async insert(referral: Referral): Promise<Result<Referral | null, StorageError>> {
    if (this.memory.has(referral.invitedId)) return Ok(null)
    this.memory.set(referral.invitedId, { ...referral })
    return Ok({ ...referral })
  }

  async findByInvited(invitedId: string): Promise<Result<Referral | null, StorageError>> {
    const referral = this.memory.get(invitedId)
    return Ok(referral ? { ...referral } : null)
  }

  async markBonusGranted({
    id,
    now,
  }: { id: string; now: number }): Promise<Result<Referral | null, StorageError>> {
    for (const [invitedId, referral] of this.memory) {
      if (referral.id !== id) continue
      const next = { ...referral, bonusGrantedAtM: now }
      this.memory.set(invitedId, next)
      return Ok({ ...next })
    }
    return Ok(null)
  }
}
