import { isEntitled } from "@peerline/db/validators"
import type { IntentMachineContext } from "./types"

// only activation may run for a user without a subscription
export const isMissingSubscription = ({ context }: { context: IntentMachineContext }) =>
  context.subscription === null && context.intent.kind !== "activate"

export const isSubscriptionEntitled = (context: IntentMachineContext) =>
  context.subscription !== null && isEntitled(context.subscription, context.now)

export const isCommitted = ({ context }: { context: IntentMachineContext }) =>
  context.result?.type === "committed"

export const isRejected = ({ context }: { context: IntentMachineContext }) =>
  context.result?.type === "rejected"
