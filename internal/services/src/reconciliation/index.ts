export { Reconciler, type ReconcileReport, type SweepReport } from "./service"
export { DivergenceQueue } from "./queue"
export type { DivergenceStore } from "./store"
export { MemoryDivergenceStore } from "./providers/memory"
export { DrizzleDivergenceStore } from "./providers/drizzle"
export { ReconciliationError, type ReconciliationErrorCode } from "./errors"
