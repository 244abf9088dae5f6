import type { Referral } from "@peerline/db/validators"
import type { Result } from "@peerline/error"
import type { StorageError } from "../errors"

export interface ReferralRepository {
  readonly name: string

  /**
   * Stores the invitation, `null` when the invited user was already referred
   */
  insert(referral: Referral): Promise<Result<Referral | null, StorageError>>

  findByInvited(invitedId: string): Promise<Result<Referral | null, StorageError>>

  markBonusGranted(params: { id: string; now: number }): Promise<Result<Referral | null, StorageError>>
}
