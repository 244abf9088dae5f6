import { type Database, eq, primaryOf } from "@peerline/db"
import { referrals } from "@peerline/db/schema"
import type { Referral } from "@peerline/db/validators"
import { Err, Ok, type Result } from "@peerline/error"
import type { Logger } from "@peerline/logging"
import { StorageError } from "../../errors"
import type { ReferralRepository } from "../repository"

export class DrizzleReferralRepository implements ReferralRepository {
  readonly name = "drizzle"
  private readonly db: Database
  private readonly logger: Logger

  constructor({ db, logger }: { db: Database; logger: Logger }) {
    this.db = db
    this.logger = logger
  }

  private fail(operation: string, error: unknown, context: Record<string, unknown>) {
    const err = StorageError.from(operation, error, context)
    this.logger.error(`referrals ${operation} failed`, { ...context, error: err.message })
    return Err(err)
  }

  async insert(referral: Referral): Promise<Result<Referral | null, StorageError>> {
    try {
      const [row] = await this.db
        .insert(referrals)
        .values(referral)
        .onConflictDoNothing({ target: referrals.invitedId })
        .returning()
      return Ok(row ?? null)
    } catch (error) {
      return this.fail("insert", error, { invitedId: referral.invitedId })
    }
  }

  async findByInvited(invitedId: string): Promise<Result<Referral | null, StorageError>> {
    try {
      const referral = await primaryOf(this.db).query.referrals.findFirst({
        where: (table, { eq }) => eq(table.invitedId, invitedId),
      })
      return Ok(referral ?? null)
    } catch (error) {
      return this.fail("findByInvited", error, { invitedId })
    }
  }

  async markBonusGranted({
    id,
    now,
  }: { id: string; now: number }): Promise<Result<Referral | null, StorageError>> {
    try {
      const [row] = await this.db
        .update(referrals)
        .set({ bonusGrantedAtM: now })
        .where(eq(referrals.id, id))
        .returning()
      return Ok(row ?? null)
    } catch (error) {
      return this.fail("markBonusGranted", error, { id })
    }
  }
}
