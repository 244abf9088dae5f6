import { type Database, primaryOf } from "@peerline/db"
import { provisioningIntents } from "@peerline/db/schema"
import type { IntentRecord } from "@peerline/db/validators"
import { Err, Ok, type Result } from "@peerline/error"
import type { Logger } from "@peerline/logging"
import { StorageError } from "../../errors"
import type { IntentStore } from "../store"

export class DrizzleIntentStore implements IntentStore {
  readonly name = "drizzle"
  private readonly db: Database
  private readonly logger: Logger

  constructor({ db, logger }: { db: Database; logger: Logger }) {
    this.db = db
    this.logger = logger
  }

  async find(idempotencyKey: string): Promise<Result<IntentRecord | null, StorageError>> {
    try {
      const record = await primaryOf(this.db).query.provisioningIntents.findFirst({
        where: (table, { eq }) => eq(table.idempotencyKey, idempotencyKey),
      })
      return Ok(record ?? null)
    } catch (error) {
      const err = StorageError.from("find", error, { idempotencyKey })
      this.logger.error("intent lookup failed", { idempotencyKey, error: err.message })
      return Err(err)
    }
  }

  async record(record: IntentRecord): Promise<Result<void, StorageError>> {
    try {
      await this.db
        .insert(provisioningIntents)
        .values(record)
        .onConflictDoNothing({ target: provisioningIntents.idempotencyKey })
      return Ok(undefined)
    } catch (error) {
      const err = StorageError.from("record", error, { idempotencyKey: record.idempotencyKey })
      this.logger.error("intent record failed", {
        idempotencyKey: record.idempotencyKey,
        error: err.message,
      })
      return Err(err)
    }
  }
}
