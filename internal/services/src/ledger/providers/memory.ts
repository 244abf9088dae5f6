import type { Subscription } from "@peerline/db/validators"
import { Ok, type Result } from "@peerline/error"
import type { StorageError } from "../../errors"
import type { CreditApplication, SubscriptionPatch, SubscriptionRepository } from "../repository"

/**
 * In-process subscriptions, for tests and local runs
 */
export class MemorySubscriptionRepository implements SubscriptionRepository {
  readonly name = "memory"
  private readonly memory: Map<string, Subscription>
  // credit event id -> user id
  private readonly credits = new Map<string, string>()

  constructor(opts: { memory?: Map<string, Subscription> } = {}) {
    this.memory = opts.memory ?? new Map()
  }

  async find(userId: string): Promise<Result<Subscription | null, StorageError>> {
    const value = this.memory.get(userId)
    return Ok(value ? { ...value } : null)
  }

  async insert(subscription: Subscription): Promise<Result<Subscription, StorageError>> {
    this.memory.set(subscription.userId, { ...subscription })
    return Ok({ ...subscription })
  }

  async update({
    userId,
    patch,
    now,
  }: {
    userId: string
    patch: SubscriptionPatch
    now: number
  }): Promise<Result<Subscription | null, StorageError>> {
    const current = this.memory.get(userId)
    if (!current) return Ok(null)

    const next = { ...current, ...patch, updatedAtM: now }
    this.memory.set(userId, next)
    return Ok({ ...next })
  }

  async listDue({
    now,
    limit,
  }: { now: number; limit: number }): Promise<Result<Subscription[], StorageError>> {
    const due = [...this.memory.values()]
      .filter((s) => s.status !== "expired" && s.activeUntil <= now)
      .sort((a, b) => a.activeUntil - b.activeUntil)
      .slice(0, limit)
      .map((s) => ({ ...s }))

    return Ok(due)
  }

  async applyCredit({
    userId,
    creditEventId,
    patch,
    now,
  }: {
    userId: string
    creditEventId: string
    seconds: number
    patch: SubscriptionPatch
    now: number
  }): Promise<Result<CreditApplication, StorageError>> {
    if (this.credits.has(creditEventId)) return Ok({ applied: false, reason: "duplicate" })

    const current = this.memory.get(userId)
    if (!current) return Ok({ applied: false, reason: "not_found" })

    this.credits.set(creditEventId, userId)
    const next = { ...current, ...patch, updatedAtM: now }
    this.memory.set(userId, next)
    return Ok({ applied: true, subscription: { ...next } })
  }
}
