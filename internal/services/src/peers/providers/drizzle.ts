import { type Database, and, asc, count, eq, inArray, ne, primaryOf } from "@peerline/db"
import { vpnPeers } from "@peerline/db/schema"
import type { PeerRecord, PeerState } from "@peerline/db/validators"
import { Err, Ok, type Result } from "@peerline/error"
import type { Logger } from "@peerline/logging"
import { StorageError } from "../../errors"
import type { PeerPatch, PeerRepository } from "../repository"

/**
 * Peer rows in Postgres. Lookups read the primary since they feed decisions
 * made under the user's lock; only the sweep listing may use a replica.
 */
export class DrizzlePeerRepository implements PeerRepository {
  readonly name = "drizzle"
  private readonly db: Database
  private readonly logger: Logger

  constructor({ db, logger }: { db: Database; logger: Logger }) {
    this.db = db
    this.logger = logger
  }

  private fail(operation: string, error: unknown, context: Record<string, unknown>) {
    const err = StorageError.from(operation, error, context)
    this.logger.error(`peers ${operation} failed`, { ...context, error: err.message })
    return Err(err)
  }

  async insert(peer: PeerRecord): Promise<Result<PeerRecord, StorageError>> {
    try {
      const [row] = await this.db.insert(vpnPeers).values(peer).returning()
      if (!row) {
        return Err(new StorageError({ message: "insert returned no row", operation: "insert" }))
      }
      return Ok(row)
    } catch (error) {
      return this.fail("insert", error, { peerId: peer.id, userId: peer.userId })
    }
  }

  async find(peerId: string): Promise<Result<PeerRecord | null, StorageError>> {
    try {
      const peer = await primaryOf(this.db).query.vpnPeers.findFirst({
        where: (table, { eq }) => eq(table.id, peerId),
      })
      return Ok(peer ?? null)
    } catch (error) {
      return this.fail("find", error, { peerId })
    }
  }

  async findByIdempotencyKey(
    idempotencyKey: string
  ): Promise<Result<PeerRecord | null, StorageError>> {
    try {
      const peer = await primaryOf(this.db).query.vpnPeers.findFirst({
        where: (table, { eq }) => eq(table.idempotencyKey, idempotencyKey),
      })
      return Ok(peer ?? null)
    } catch (error) {
      return this.fail("findByIdempotencyKey", error, { idempotencyKey })
    }
  }

  async listByUser({
    userId,
    states,
  }: {
    userId: string
    states?: PeerState[]
  }): Promise<Result<PeerRecord[], StorageError>> {
    try {
      const rows = await primaryOf(this.db)
        .select()
        .from(vpnPeers)
        .where(
          and(
            eq(vpnPeers.userId, userId),
            states && states.length > 0 ? inArray(vpnPeers.state, states) : undefined
          )
        )
        .orderBy(asc(vpnPeers.createdAtM))
      return Ok(rows)
    } catch (error) {
      return this.fail("listByUser", error, { userId })
    }
  }

  async countActive(userId: string): Promise<Result<number, StorageError>> {
    try {
      const [row] = await primaryOf(this.db)
        .select({ total: count() })
        .from(vpnPeers)
        .where(and(eq(vpnPeers.userId, userId), eq(vpnPeers.state, "active")))
      return Ok(row?.total ?? 0)
    } catch (error) {
      return this.fail("countActive", error, { userId })
    }
  }

  async update({
    peerId,
    patch,
    now,
  }: {
    peerId: string
    patch: PeerPatch
    now: number
  }): Promise<Result<PeerRecord | null, StorageError>> {
    try {
      const [row] = await this.db
        .update(vpnPeers)
        .set({ ...patch, updatedAtM: now })
        .where(eq(vpnPeers.id, peerId))
        .returning()
      return Ok(row ?? null)
    } catch (error) {
      return this.fail("update", error, { peerId })
    }
  }

  async delete(peerId: string): Promise<Result<void, StorageError>> {
    try {
      await this.db.delete(vpnPeers).where(eq(vpnPeers.id, peerId))
      return Ok(undefined)
    } catch (error) {
      return this.fail("delete", error, { peerId })
    }
  }

  async listUsersWithPeers({ limit }: { limit: number }): Promise<Result<string[], StorageError>> {
    try {
      const rows = await this.db
        .selectDistinct({ userId: vpnPeers.userId })
        .from(vpnPeers)
        .where(ne(vpnPeers.state, "revoked"))
        .orderBy(asc(vpnPeers.userId))
        .limit(limit)
      return Ok(rows.map((r) => r.userId))
    } catch (error) {
      return this.fail("listUsersWithPeers", error, { limit })
    }
  }
}
