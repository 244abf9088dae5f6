import { bigint, index, text, varchar } from "drizzle-orm/pg-core"

import { pgTablePeerline } from "../utils/_table"
import { cuid } from "../utils/fields"
import { intentKindEnum, intentStatusEnum } from "./enums"

// terminal outcomes by idempotency key, failed outcomes are never stored
export const provisioningIntents = pgTablePeerline(
  "provisioning_intents",
  {
    idempotencyKey: varchar("idempotency_key", { length: 128 }).primaryKey(),
    intentId: cuid("intent_id").notNull(),
    userId: cuid("user_id").notNull(),
    kind: intentKindEnum("kind").notNull(),
    status: intentStatusEnum("status").notNull(),
    reason: text("reason"),
    peerId: cuid("peer_id"),
    createdAtM: bigint("created_at_m", { mode: "number" }).notNull(),
  },
  (table) => ({
    byUser: index("provisioning_intents_user_idx").on(table.userId),
  })
)
