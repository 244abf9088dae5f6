import { relations } from "drizzle-orm"
import { bigint, index, text, uniqueIndex, varchar } from "drizzle-orm/pg-core"

import { pgTablePeerline } from "../utils/_table"
import { cuid, timestamps } from "../utils/fields"
import { peerStateEnum } from "./enums"
import { subscriptions } from "./subscriptions"

// local view of the peers the appliance should hold for each user
export const vpnPeers = pgTablePeerline(
  "vpn_peers",
  {
    ...timestamps,
    id: cuid("id").primaryKey(),
    userId: cuid("user_id")
      .notNull()
      .references(() => subscriptions.userId, { onDelete: "cascade" }),
    // assigned by the appliance, null while pending
    remoteId: varchar("remote_id", { length: 128 }),
    idempotencyKey: varchar("idempotency_key", { length: 128 }).notNull(),
    state: peerStateEnum("state").notNull().default("pending"),
    label: text("label"),
    publicKey: text("public_key"),
    // client configuration from the appliance, kept so a replayed issue can hand it out again
    config: text("client_config"),
    revokedAtM: bigint("revoked_at_m", { mode: "number" }),
  },
  (table) => ({
    byUser: index("vpn_peers_user_state_idx").on(table.userId, table.state),
    idempotency: uniqueIndex("vpn_peers_idempotency_key_idx").on(table.idempotencyKey),
  })
)

export const vpnPeersRelations = relations(vpnPeers, ({ one }) => ({
  subscription: one(subscriptions, {
    fields: [vpnPeers.userId],
    references: [subscriptions.userId],
  }),
}))
