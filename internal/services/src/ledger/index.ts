export { SubscriptionLedger } from "./service"
export { LedgerError, type LedgerErrorCode } from "./errors"
export type { SubscriptionRepository, SubscriptionPatch, CreditApplication } from "./repository"
export { MemorySubscriptionRepository } from "./providers/memory"
export { DrizzleSubscriptionRepository } from "./providers/drizzle"
