export type NotificationEvent =
  | { type: "peer.issued"; userId: string; peerId: string; at: number }
  | { type: "peer.revoked"; userId: string; peerId: string; at: number }
  | { type: "subscription.renewed"; userId: string; activeUntil: number; at: number }
  | { type: "subscription.expired"; userId: string; at: number }
  | { type: "subscription.grace"; userId: string; unresolvedPeers: string[]; at: number }
  | { type: "referral.credited"; userId: string; seconds: number; at: number }

/**
 * Fire-and-forget delivery to the user-facing front-end
 */
export interface NotificationSink {
  publish(event: NotificationEvent): Promise<void>
}
