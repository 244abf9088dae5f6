export { StorageError } from "./errors"
export { createProvisioning, type Provisioning, type ProvisioningSettings, type ProvisioningStores } from "./provisioning"
export * from "./quota"
export * from "./ledger"
export * from "./peers"
export * from "./gateway"
export * from "./locks"
export * from "./orchestrator"
export * from "./reconciliation"
export * from "./scheduler"
export * from "./referrals"
export * from "./notifications"
