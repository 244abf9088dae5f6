import type { PlanTier } from "@peerline/config"
import type { Subscription } from "@peerline/db/validators"
import { Err, Ok, type Result } from "@peerline/error"
import type { Logger } from "@peerline/logging"
import { LedgerError } from "./errors"
import type { SubscriptionPatch, SubscriptionRepository } from "./repository"

const SECOND_MS = 1000

function validSeconds(seconds: number): boolean {
  return Number.isFinite(seconds) && seconds > 0
}

/**
 * The only writer of subscriptions. Every operation assumes the caller holds
 * the user's lock, the ledger itself does not serialize anything.
 */
export class SubscriptionLedger {
  private readonly repository: SubscriptionRepository
  private readonly logger: Logger

  constructor({ repository, logger }: { repository: SubscriptionRepository; logger: Logger }) {
    this.repository = repository
    this.logger = logger
  }

  private storage(userId: string, cause: LedgerError["cause"]) {
    return Err(
      new LedgerError({
        code: "STORAGE",
        message: "subscription store unavailable",
        userId,
        cause,
      })
    )
  }

  private notFound(userId: string) {
    return Err(new LedgerError({ code: "NOT_FOUND", message: "no subscription", userId }))
  }

  private async write(
    userId: string,
    patch: SubscriptionPatch,
    now: number
  ): Promise<Result<Subscription, LedgerError>> {
    const { val, err } = await this.repository.update({ userId, patch, now })
    if (err) return this.storage(userId, err)
    if (!val) return this.notFound(userId)
    return Ok(val)
  }

  public async get(userId: string): Promise<Result<Subscription, LedgerError>> {
    const { val, err } = await this.repository.find(userId)
    if (err) return this.storage(userId, err)
    if (!val) return this.notFound(userId)
    return Ok(val)
  }

  /**
   * Lock-free read for the expiry sweep, re-checked under lock by the expire step
   */
  public async listDue({
    now,
    limit,
  }: { now: number; limit: number }): Promise<Result<Subscription[], LedgerError>> {
    const { val, err } = await this.repository.listDue({ now, limit })
    if (err) return this.storage("*", err)
    return Ok(val)
  }

  /**
   * Opens a subscription or moves an existing one to another plan. A trial
   * is granted at most once per user.
   */
  public async activate({
    userId,
    plan,
    extensionSeconds,
    now,
  }: {
    userId: string
    plan: PlanTier
    extensionSeconds: number
    now: number
  }): Promise<Result<Subscription, LedgerError>> {
    if (!validSeconds(extensionSeconds)) {
      return Err(
        new LedgerError({
          code: "INVALID_EXTENSION",
          message: "extension must be a positive number of seconds",
          userId,
          context: { extensionSeconds },
        })
      )
    }

    const { val: current, err } = await this.repository.find(userId)
    if (err) return this.storage(userId, err)

    const isTrial = plan === "trial"

    if (isTrial && current?.trialUsed) {
      return Err(
        new LedgerError({ code: "TRIAL_ALREADY_USED", message: "trial already used", userId })
      )
    }

    if (!current) {
      const inserted = await this.repository.insert({
        userId,
        plan,
        status: isTrial ? "trial" : "active",
        activeUntil: now + extensionSeconds * SECOND_MS,
        referralCreditSeconds: 0,
        trialUsed: isTrial,
        expiredAt: null,
        createdAtM: now,
        updatedAtM: now,
      })
      if (inserted.err) return this.storage(userId, inserted.err)

      this.logger.info("subscription opened", { userId, plan })
      return Ok(inserted.val)
    }

    const result = await this.write(
      userId,
      {
        plan,
        status: isTrial ? "trial" : "active",
        activeUntil: Math.max(current.activeUntil, now) + extensionSeconds * SECOND_MS,
        trialUsed: current.trialUsed || isTrial,
        expiredAt: null,
      },
      now
    )

    if (result.val) this.logger.info("subscription plan changed", { userId, from: current.plan, plan })
    return result
  }

  /**
   * Extends the window from whichever is later, its current end or now
   */
  public async renew({
    userId,
    extensionSeconds,
    now,
    plan,
  }: {
    userId: string
    extensionSeconds: number
    now: number
    plan?: Exclude<PlanTier, "trial">
  }): Promise<Result<Subscription, LedgerError>> {
    if (!validSeconds(extensionSeconds)) {
      return Err(
        new LedgerError({
          code: "INVALID_EXTENSION",
          message: "extension must be a positive number of seconds",
          userId,
          context: { extensionSeconds },
        })
      )
    }

    const current = await this.get(userId)
    if (current.err) return current

    // a paid renewal ends the trial
    const nextPlan = plan ?? (current.val.plan === "trial" ? "standard" : current.val.plan)

    return this.write(
      userId,
      {
        plan: nextPlan,
        status: "active",
        activeUntil: Math.max(current.val.activeUntil, now) + extensionSeconds * SECOND_MS,
        expiredAt: null,
      },
      now
    )
  }

  /**
   * Adds seconds straight onto the window end. The credit event id is recorded
   * and a repeated id is refused.
   */
  public async applyReferralCredit({
    userId,
    creditEventId,
    seconds,
    now,
  }: {
    userId: string
    creditEventId: string
    seconds: number
    now: number
  }): Promise<Result<Subscription, LedgerError>> {
    if (!validSeconds(seconds) || creditEventId.length === 0) {
      return Err(
        new LedgerError({
          code: "INVALID_CREDIT",
          message: "credit needs an event id and a positive number of seconds",
          userId,
          context: { creditEventId, seconds },
        })
      )
    }

    const current = await this.get(userId)
    if (current.err) return current

    const subscription = current.val
    const activeUntil = subscription.activeUntil + seconds * SECOND_MS
    const reopened =
      (subscription.status === "expired" || subscription.status === "grace") && now < activeUntil

    const patch: SubscriptionPatch = {
      activeUntil,
      referralCreditSeconds: subscription.referralCreditSeconds + seconds,
    }

    if (reopened) {
      patch.status = subscription.plan === "trial" ? "trial" : "active"
      patch.expiredAt = null
    }

    const { val, err } = await this.repository.applyCredit({
      userId,
      creditEventId,
      seconds,
      patch,
      now,
    })

    if (err) return this.storage(userId, err)

    if (!val.applied) {
      if (val.reason === "not_found") return this.notFound(userId)
      return Err(
        new LedgerError({
          code: "DUPLICATE_CREDIT",
          message: "credit event already applied",
          userId,
          context: { creditEventId },
        })
      )
    }

    return Ok(val.subscription)
  }

  /**
   * Marks the subscription expired once its window has closed. Expiring an
   * already expired subscription returns it unchanged.
   */
  public async expire({
    userId,
    now,
  }: { userId: string; now: number }): Promise<Result<Subscription, LedgerError>> {
    const current = await this.get(userId)
    if (current.err) return current

    if (current.val.status === "expired") return current

    if (now < current.val.activeUntil) {
      return Err(
        new LedgerError({
          code: "NOT_YET_EXPIRED",
          message: "subscription window is still open",
          userId,
          context: { activeUntil: current.val.activeUntil, now },
        })
      )
    }

    return this.write(userId, { status: "expired", expiredAt: now }, now)
  }

  /**
   * Window closed but some peers could not be revoked yet
   */
  public async markGrace({
    userId,
    now,
  }: { userId: string; now: number }): Promise<Result<Subscription, LedgerError>> {
    const current = await this.get(userId)
    if (current.err) return current

    if (now < current.val.activeUntil) {
      return Err(
        new LedgerError({
          code: "NOT_YET_EXPIRED",
          message: "subscription window is still open",
          userId,
          context: { activeUntil: current.val.activeUntil, now },
        })
      )
    }

    return this.write(userId, { status: "grace" }, now)
  }
}
