import { bigint, varchar } from "drizzle-orm/pg-core"

import { pgTablePeerline } from "../utils/_table"
import { timestamps } from "../utils/fields"

// one row per held lock, deleted on release
export const provisioningLocks = pgTablePeerline("provisioning_locks", {
  ...timestamps,
  resource: varchar("resource", { length: 64 }).primaryKey(),
  ownerToken: varchar("owner_token", { length: 64 }).notNull(),
  fence: bigint("fence", { mode: "number" }).notNull(),
  expiresAt: bigint("expires_at_m", { mode: "number" }).notNull(),
})
