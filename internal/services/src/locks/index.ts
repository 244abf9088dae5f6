export { LockManager, type AcquireOptions } from "./manager"
export { Lock } from "./lock"
export { LockError, type LockErrorCode } from "./errors"
export type { LockStore } from "./store"
export { MemoryLockStore } from "./providers/memory"
export { DrizzleLockStore } from "./providers/drizzle"
