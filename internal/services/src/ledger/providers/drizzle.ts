import { type Database, and, asc, eq, inArray, lte, primaryOf } from "@peerline/db"
import { referralCredits, subscriptions } from "@peerline/db/schema"
import type { Subscription } from "@peerline/db/validators"
import { Err, Ok, type Result } from "@peerline/error"
import type { Logger } from "@peerline/logging"
import { StorageError } from "../../errors"
import type { CreditApplication, SubscriptionPatch, SubscriptionRepository } from "../repository"

export class DrizzleSubscriptionRepository implements SubscriptionRepository {
  readonly name = "drizzle"
  private readonly db: Database
  private readonly logger: Logger

  constructor({ db, logger }: { db: Database; logger: Logger }) {
    this.db = db
    this.logger = logger
  }

  private fail(operation: string, error: unknown, context: Record<string, unknown>) {
    const err = StorageError.from(operation, error, context)
    this.logger.error(`subscriptions ${operation} failed`, { ...context, error: err.message })
    return Err(err)
  }

  async find(userId: string): Promise<Result<Subscription | null, StorageError>> {
    try {
      const subscription = await primaryOf(this.db).query.subscriptions.findFirst({
        where: (table, { eq }) => eq(table.userId, userId),
      })
      return Ok(subscription ?? null)
    } catch (error) {
      return this.fail("find", error, { userId })
    }
  }

  async insert(subscription: Subscription): Promise<Result<Subscription, StorageError>> {
    try {
      const [row] = await this.db.insert(subscriptions).values(subscription).returning()
      if (!row) {
        return Err(new StorageError({ message: "insert returned no row", operation: "insert" }))
      }
      return Ok(row)
    } catch (error) {
      return this.fail("insert", error, { userId: subscription.userId })
    }
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
    try {
      const [row] = await this.db
        .update(subscriptions)
        .set({ ...patch, updatedAtM: now })
        .where(eq(subscriptions.userId, userId))
        .returning()
      return Ok(row ?? null)
    } catch (error) {
      return this.fail("update", error, { userId })
    }
  }

  // lock-free, a replica will do
  async listDue({
    now,
    limit,
  }: { now: number; limit: number }): Promise<Result<Subscription[], StorageError>> {
    try {
      const rows = await this.db
        .select()
        .from(subscriptions)
        .where(
          and(
            inArray(subscriptions.status, ["trial", "active", "grace"]),
            lte(subscriptions.activeUntil, now)
          )
        )
        .orderBy(asc(subscriptions.activeUntil))
        .limit(limit)
      return Ok(rows)
    } catch (error) {
      return this.fail("listDue", error, { now, limit })
    }
  }

  async applyCredit({
    userId,
    creditEventId,
    seconds,
    patch,
    now,
  }: {
    userId: string
    creditEventId: string
    seconds: number
    patch: SubscriptionPatch
    now: number
  }): Promise<Result<CreditApplication, StorageError>> {
    try {
      const result = await this.db.transaction(async (tx): Promise<CreditApplication> => {
        const current = await tx.query.subscriptions.findFirst({
          where: (table, { eq }) => eq(table.userId, userId),
        })
        if (!current) return { applied: false, reason: "not_found" }

        // the primary key on the credit event id is what rejects a replayed credit
        const inserted = await tx
          .insert(referralCredits)
          .values({ id: creditEventId, userId, seconds, appliedAtM: now })
          .onConflictDoNothing({ target: referralCredits.id })
          .returning({ id: referralCredits.id })

        if (inserted.length === 0) return { applied: false, reason: "duplicate" }

        const [row] = await tx
          .update(subscriptions)
          .set({ ...patch, updatedAtM: now })
          .where(eq(subscriptions.userId, userId))
          .returning()

        return row ? { applied: true, subscription: row } : { applied: false, reason: "not_found" }
      })
      return Ok(result)
    } catch (error) {
      return this.fail("applyCredit", error, { userId, creditEventId })
    }
  }
}
