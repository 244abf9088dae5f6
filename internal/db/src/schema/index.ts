export * from "./enums"
export * from "./subscriptions"
export * from "./peers"
export * from "./provisioningLocks"
export * from "./intents"
export * from "./referrals"
export * from "./divergence"
