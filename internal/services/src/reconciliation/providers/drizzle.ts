import { type Database, and, asc, eq, lte } from "@peerline/db"
import { divergenceFlags } from "@peerline/db/schema"
import type { DivergenceFlag } from "@peerline/db/validators"
import { Err, Ok, type Result } from "@peerline/error"
import type { Logger } from "@peerline/logging"
import { StorageError } from "../../errors"
import type { DivergenceStore } from "../store"

export class DrizzleDivergenceStore implements DivergenceStore {
  readonly name = "drizzle"
  private readonly db: Database
  private readonly logger: Logger

  constructor({ db, logger }: { db: Database; logger: Logger }) {
    this.db = db
    this.logger = logger
  }

  private fail(operation: string, error: unknown, context: Record<string, unknown>) {
    const err = StorageError.from(operation, error, context)
    this.logger.error(`divergence ${operation} failed`, { ...context, error: err.message })
    return Err(err)
  }

  async flag(flag: DivergenceFlag): Promise<Result<void, StorageError>> {
    try {
      await this.db
        .insert(divergenceFlags)
        .values(flag)
        .onConflictDoNothing({ target: divergenceFlags.userId })
      return Ok(undefined)
    } catch (error) {
      return this.fail("flag", error, { userId: flag.userId })
    }
  }

  async list({ limit }: { limit: number }): Promise<Result<string[], StorageError>> {
    try {
      const rows = await this.db
        .select({ userId: divergenceFlags.userId })
        .from(divergenceFlags)
        .orderBy(asc(divergenceFlags.sinceM))
        .limit(limit)
      return Ok(rows.map((row) => row.userId))
    } catch (error) {
      return this.fail("list", error, { limit })
    }
  }

  async clear({ userId, before }: { userId: string; before: number }): Promise<Result<void, StorageError>> {
    try {
      await this.db
        .delete(divergenceFlags)
        .where(and(eq(divergenceFlags.userId, userId), lte(divergenceFlags.sinceM, before)))
      return Ok(undefined)
    } catch (error) {
      return this.fail("clear", error, { userId })
    }
  }
}
