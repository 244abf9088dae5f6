import type { Subscription } from "@peerline/db/validators"
import type { Result } from "@peerline/error"
import type { StorageError } from "../errors"

export type SubscriptionPatch = Partial<
  Pick<
    Subscription,
    "plan" | "status" | "activeUntil" | "referralCreditSeconds" | "trialUsed" | "expiredAt"
  >
>

export type CreditApplication =
  | { applied: true; subscription: Subscription }
  | { applied: false; reason: "duplicate" | "not_found" }

/**
 * Persistence for subscriptions. Every write is a single-row change, the
 * caller holds the user's lock.
 */
export interface SubscriptionRepository {
  readonly name: string

  find(userId: string): Promise<Result<Subscription | null, StorageError>>

  insert(subscription: Subscription): Promise<Result<Subscription, StorageError>>

  update(params: {
    userId: string
    patch: SubscriptionPatch
    now: number
  }): Promise<Result<Subscription | null, StorageError>>

  /**
   * Subscriptions whose window has closed but are not yet expired.
   * Lock-free, results may be stale.
   */
  listDue(params: { now: number; limit: number }): Promise<Result<Subscription[], StorageError>>

  /**
   * Records the credit event and applies the patch atomically. A credit
   * event id is accepted once.
   */
  applyCredit(params: {
    userId: string
    creditEventId: string
    seconds: number
    patch: SubscriptionPatch
    now: number
  }): Promise<Result<CreditApplication, StorageError>>
}
