import { type Database, and, eq, gt, lte, primaryOf, sql } from "@peerline/db"
import { provisioningLocks } from "@peerline/db/schema"
import type { LockStore } from "../store"

/**
 * Lock rows in Postgres. A fresh row starts its fence at the current time, a
 * takeover of an expired row bumps it past both the old fence and now.
 */
export class DrizzleLockStore implements LockStore {
  readonly name = "drizzle"
  private readonly db: Database

  constructor({ db }: { db: Database }) {
    this.db = db
  }

  async acquire({
    resource,
    token,
    ttlMs,
    now,
  }: {
    resource: string
    token: string
    ttlMs: number
    now: number
  }): Promise<{ fence: number } | null> {
    const expiresAt = now + ttlMs

    const inserted = await this.db
      .insert(provisioningLocks)
      .values({
        resource,
        ownerToken: token,
        fence: now,
        expiresAt,
        createdAtM: now,
        updatedAtM: now,
      })
      .onConflictDoNothing({ target: provisioningLocks.resource })
      .returning({ fence: provisioningLocks.fence })

    const [created] = inserted
    if (created) return { fence: created.fence }

    // row exists; take it over only once it has expired
    const [taken] = await this.db
      .update(provisioningLocks)
      .set({
        ownerToken: token,
        fence: sql`greatest(${provisioningLocks.fence} + 1, ${now})`,
        expiresAt,
        updatedAtM: now,
      })
      .where(and(eq(provisioningLocks.resource, resource), lte(provisioningLocks.expiresAt, now)))
      .returning({ fence: provisioningLocks.fence })

    return taken ? { fence: taken.fence } : null
  }

  async extend({
    resource,
    token,
    ttlMs,
    now,
  }: {
    resource: string
    token: string
    ttlMs: number
    now: number
  }): Promise<boolean> {
    const updated = await this.db
      .update(provisioningLocks)
      .set({ expiresAt: now + ttlMs, updatedAtM: now })
      .where(
        and(
          eq(provisioningLocks.resource, resource),
          eq(provisioningLocks.ownerToken, token),
          gt(provisioningLocks.expiresAt, now)
        )
      )
      .returning({ resource: provisioningLocks.resource })

    return updated.length > 0
  }

  async release({ resource, token }: { resource: string; token: string }): Promise<boolean> {
    const deleted = await this.db
      .delete(provisioningLocks)
      .where(and(eq(provisioningLocks.resource, resource), eq(provisioningLocks.ownerToken, token)))
      .returning({ resource: provisioningLocks.resource })

    return deleted.length > 0
  }

  async validate({
    resource,
    token,
    fence,
    now,
  }: {
    resource: string
    token: string
    fence: number
    now: number
  }): Promise<boolean> {
    // a replica may lag behind a takeover
    const rows = await primaryOf(this.db)
      .select({ resource: provisioningLocks.resource })
      .from(provisioningLocks)
      .where(
        and(
          eq(provisioningLocks.resource, resource),
          eq(provisioningLocks.ownerToken, token),
          eq(provisioningLocks.fence, fence),
          gt(provisioningLocks.expiresAt, now)
        )
      )
      .limit(1)

    return rows.length > 0
  }
}
