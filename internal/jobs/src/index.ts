export { expirySchedule } from "./trigger/schedules/expiry"
export { reconciliationSchedule } from "./trigger/schedules/reconciliation"
export { expireTask } from "./trigger/tasks/expire"
export { reconcileTask } from "./trigger/tasks/reconcile"
