import type { Pool } from "@neondatabase/serverless"
import type { NeonDatabase } from "drizzle-orm/neon-serverless"
import type { PgWithReplicas } from "drizzle-orm/pg-core"
import type * as schema from "./schema"

export * from "drizzle-orm"

type NeonDB = PgWithReplicas<
  NeonDatabase<typeof schema> & {
    $client: Pool
  }
>
type NeonTransactionDatabase = Parameters<Parameters<NeonDB["transaction"]>[0]>[0]

export type Database = NeonDB | NeonTransactionDatabase

/**
 * Reads that decide a write go to the primary, a replica may lag behind it
 */
export function primaryOf(db: Database) {
  return "$primary" in db ? db.$primary : db
}

export { createConnection, type ConnectionDatabaseOptions } from "./createConnection"
