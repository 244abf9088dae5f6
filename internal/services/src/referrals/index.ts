export { ReferralService, type BonusResult } from "./service"
export { ReferralError, type ReferralErrorCode } from "./errors"
export type { ReferralRepository } from "./repository"
export { MemoryReferralRepository } from "./providers/memory"
export { DrizzleReferralRepository } from "./providers/drizzle"
