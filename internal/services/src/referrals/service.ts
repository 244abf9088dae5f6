import { newId } from "@peerline/db/utils"
import type { Referral } from "@peerline/db/validators"
import { Err, Ok, type Result } from "@peerline/error"
import type { Logger } from "@peerline/logging"
import type { SubscriptionLedger } from "../ledger"
import { type Outcome, type ProvisioningOrchestrator, createIntent } from "../orchestrator"
import { ReferralError } from "./errors"
import type { ReferralRepository } from "./repository"

export type BonusResult =
  | { granted: true; inviterId: string; outcome: Outcome }
  | { granted: false; reason: "already_granted" | "not_committed"; outcome: Outcome | null }

/**
 * Invitations and the bonus an inviter earns for them. The bonus goes
 * through the orchestrator as a credit intent keyed by the referral id.
 */
export class ReferralService {
  private readonly repository: ReferralRepository
  private readonly ledger: SubscriptionLedger
  private readonly orchestrator: ProvisioningOrchestrator
  private readonly logger: Logger

  constructor({
    repository,
    ledger,
    orchestrator,
    logger,
  }: {
    repository: ReferralRepository
    ledger: SubscriptionLedger
    orchestrator: ProvisioningOrchestrator
    logger: Logger
  }) {
    this.repository = repository
    this.ledger = ledger
    this.orchestrator = orchestrator
    this.logger = logger
  }

  private storage(invitedId: string, cause: ReferralError["cause"]) {
    return Err(
      new ReferralError({ code: "STORAGE", message: "referral store unavailable", invitedId, cause })
    )
  }

  /**
   * Records who invited whom. Returns `null` when the invited user was
   * already referred or has taken a trial before.
   */
  public async register({
    inviterId,
    invitedId,
    now,
  }: {
    inviterId: string
    invitedId: string
    now: number
  }): Promise<Result<Referral | null, ReferralError>> {
    if (inviterId === invitedId) {
      return Err(
        new ReferralError({ code: "SELF_REFERRAL", message: "users cannot invite themselves", invitedId })
      )
    }

    const existing = await this.ledger.get(invitedId)
    if (existing.err && existing.err.code !== "NOT_FOUND") return this.storage(invitedId, existing.err)
    if (existing.val?.trialUsed) return Ok(null)

    const { val, err } = await this.repository.insert({
      id: newId("referral"),
      inviterId,
      invitedId,
      bonusGrantedAtM: null,
      createdAtM: now,
    })
    if (err) return this.storage(invitedId, err)

    if (val) this.logger.info("referral registered", { inviterId, invitedId, referralId: val.id })
    return Ok(val)
  }

  /**
   * Credits the inviter of `invitedId`. An inviter without a subscription
   * gets a standard one for the bonus period instead.
   */
  public async grantBonus({
    invitedId,
    seconds,
    now,
  }: {
    invitedId: string
    seconds: number
    now: number
  }): Promise<Result<BonusResult, ReferralError>> {
    const found = await this.repository.findByInvited(invitedId)
    if (found.err) return this.storage(invitedId, found.err)

    const referral = found.val
    if (!referral) {
      return Err(new ReferralError({ code: "NOT_FOUND", message: "user was not invited", invitedId }))
    }

    if (referral.bonusGrantedAtM !== null) {
      this.logger.info("referral bonus already granted", { invitedId, referralId: referral.id })
      return Ok({ granted: false, reason: "already_granted", outcome: null })
    }

    const key = `referral:${referral.id}`
    let outcome = await this.orchestrator.submitIntent(
      createIntent(
        {
          kind: "credit",
          userId: referral.inviterId,
          idempotencyKey: key,
          creditEventId: key,
          seconds,
        },
        now
      )
    )

    if (outcome.status === "rejected" && outcome.reason === "NoSubscription") {
      outcome = await this.orchestrator.submitIntent(
        createIntent(
          {
            kind: "activate",
            userId: referral.inviterId,
            idempotencyKey: `${key}:activate`,
            plan: "standard",
            extensionSeconds: seconds,
          },
          now
        )
      )
    }

    if (outcome.status !== "committed") {
      this.logger.warn("referral bonus not granted", {
        invitedId,
        referralId: referral.id,
        status: outcome.status,
        reason: outcome.reason,
      })
      return Ok({ granted: false, reason: "not_committed", outcome })
    }

    const marked = await this.repository.markBonusGranted({ id: referral.id, now })
    if (marked.err) return this.storage(invitedId, marked.err)

    this.logger.info("referral bonus granted", {
      inviterId: referral.inviterId,
      invitedId,
      referralId: referral.id,
      seconds,
    })

    return Ok({ granted: true, inviterId: referral.inviterId, outcome })
  }
}
