export { ProvisioningOrchestrator } from "./service"
export { createIntent, type IntentInput } from "./intent"
export { intentMachine, runIntentMachine } from "./machine"
export { OrchestratorError, type OrchestratorErrorCode } from "./errors"
export type { IntentStore } from "./store"
export { MemoryIntentStore } from "./providers/memory"
export { DrizzleIntentStore } from "./providers/drizzle"
export {
  FAIL_REASONS,
  REJECT_REASONS,
  type ActivateIntent,
  type CreditIntent,
  type ExpireIntent,
  type FailReason,
  type IssueIntent,
  type Outcome,
  type ProvisioningIntent,
  type RejectReason,
  type RenewIntent,
  type RevokeIntent,
  type StepResult,
} from "./types"
