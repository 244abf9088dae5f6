import { createInsertSchema, createSelectSchema } from "drizzle-zod"
import type { z } from "zod"

import * as schema from "../schema"

export const subscriptionSelectSchema = createSelectSchema(schema.subscriptions)
export const subscriptionInsertSchema = createInsertSchema(schema.subscriptions)
export const referralCreditSelectSchema = createSelectSchema(schema.referralCredits)

export type Subscription = z.infer<typeof subscriptionSelectSchema>
export type InsertSubscription = z.infer<typeof subscriptionInsertSchema>
export type ReferralCredit = z.infer<typeof referralCreditSelectSchema>

const DAY_MS = 86_400_000

/**
 * Whole days left in the window, zero once it has passed
 */
export function remainingDays(subscription: Pick<Subscription, "activeUntil">, now: number) {
  return Math.max(Math.floor((subscription.activeUntil - now) / DAY_MS), 0)
}

/**
 * A subscription is entitled to peers while inside its window and not expired
 */
export function isEntitled(
  subscription: Pick<Subscription, "activeUntil" | "status">,
  now: number
): boolean {
  if (subscription.status !== "active" && subscription.status !== "trial") return false
  return now < subscription.activeUntil
}
