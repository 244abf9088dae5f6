import { bigint, uniqueIndex } from "drizzle-orm/pg-core"

import { pgTablePeerline } from "../utils/_table"
import { cuid } from "../utils/fields"

// a user can only ever be invited once
export const referrals = pgTablePeerline(
  "referrals",
  {
    id: cuid("id").primaryKey(),
    inviterId: cuid("inviter_id").notNull(),
    invitedId: cuid("invited_id").notNull(),
    bonusGrantedAtM: bigint("bonus_granted_at_m", { mode: "number" }),
    createdAtM: bigint("created_at_m", { mode: "number" }).notNull(),
  },
  (table) => ({
    invited: uniqueIndex("referrals_invited_idx").on(table.invitedId),
  })
)
