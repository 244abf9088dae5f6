import { createInsertSchema, createSelectSchema } from "drizzle-zod"
import { z } from "zod"

import * as schema from "../schema"

export const peerSelectSchema = createSelectSchema(schema.vpnPeers)
export const peerInsertSchema = createInsertSchema(schema.vpnPeers)

export type PeerRecord = z.infer<typeof peerSelectSchema>
export type InsertPeerRecord = z.infer<typeof peerInsertSchema>

// what the appliance reports for a peer
export const peerHandleSchema = z.object({
  remoteId: z.string().min(1),
  userId: z.string().min(1),
  idempotencyKey: z.string().nullable().default(null),
  publicKey: z.string().nullable().default(null),
  // client configuration handed to the user
  config: z.string().nullable().default(null),
  createdAt: z.number().nullable().default(null),
})

export type PeerHandle = z.infer<typeof peerHandleSchema>
