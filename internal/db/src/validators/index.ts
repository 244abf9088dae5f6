export * from "./shared"
export * from "./subscriptions"
export * from "./peers"
export * from "./intents"
export * from "./referrals"
export * from "./divergence"
