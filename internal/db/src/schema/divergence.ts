import { bigint, index, text } from "drizzle-orm/pg-core"

import { pgTablePeerline } from "../utils/_table"
import { cuid } from "../utils/fields"

// users awaiting a reconciliation pass, the first reason is kept
export const divergenceFlags = pgTablePeerline(
  "divergence_flags",
  {
    userId: cuid("user_id").primaryKey(),
    reason: text("reason").notNull(),
    sinceM: bigint("since_m", { mode: "number" }).notNull(),
  },
  (table) => ({
    bySince: index("divergence_flags_since_idx").on(table.sinceM),
  })
)
