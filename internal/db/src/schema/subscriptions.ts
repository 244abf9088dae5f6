import { relations } from "drizzle-orm"
import { bigint, boolean, index, integer, varchar } from "drizzle-orm/pg-core"

import { pgTablePeerline } from "../utils/_table"
import { cuid, timestamps } from "../utils/fields"
import { planTierEnum, subscriptionStatusEnum } from "./enums"
import { vpnPeers } from "./peers"

// one row per user, only the ledger writes here
export const subscriptions = pgTablePeerline(
  "subscriptions",
  {
    ...timestamps,
    userId: cuid("user_id").primaryKey(),
    plan: planTierEnum("plan").notNull().default("trial"),
    status: subscriptionStatusEnum("status").notNull().default("trial"),
    // end of the paid window, never moves backwards
    activeUntil: bigint("active_until_m", { mode: "number" }).notNull(),
    // total extension granted through referrals, for reporting
    referralCreditSeconds: integer("referral_credit_seconds").notNull().default(0),
    trialUsed: boolean("trial_used").notNull().default(false),
    expiredAt: bigint("expired_at_m", { mode: "number" }),
  },
  (table) => ({
    due: index("subscriptions_due_idx").on(table.status, table.activeUntil),
  })
)

// credit events already applied, the primary key rejects duplicates
export const referralCredits = pgTablePeerline("referral_credits", {
  id: varchar("id", { length: 128 }).primaryKey(),
  userId: cuid("user_id")
    .notNull()
    .references(() => subscriptions.userId, { onDelete: "cascade" }),
  seconds: integer("seconds").notNull(),
  appliedAtM: bigint("applied_at_m", { mode: "number" }).notNull(),
})

export const subscriptionsRelations = relations(subscriptions, ({ many }) => ({
  peers: many(vpnPeers),
  credits: many(referralCredits),
}))

export const referralCreditsRelations = relations(referralCredits, ({ one }) => ({
  subscription: one(subscriptions, {
    fields: [referralCredits.userId],
    references: [subscriptions.userId],
  }),
}))
